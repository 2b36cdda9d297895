import {
  calculateBitmapTextWidth,
  calculateBitmapTextHeight,
  fitBitmapTextScale,
  renderBitmapText,
} from "../bitmapFont";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";

const blank = (width: number, height: number) =>
  BitmapUtils.createBlankBitmap(width, height);

const black = BitmapUtils.countBlackPixels;

const sameData = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i]);

describe("bitmapFont", () => {
  describe("calculateBitmapTextWidth", () => {
    it("should return 0 for empty string", () => {
      expect(calculateBitmapTextWidth("", 1)).toBe(0);
      expect(calculateBitmapTextWidth("", 2)).toBe(0);
    });

    it("should count glyphs plus one spacing column between them", () => {
      expect(calculateBitmapTextWidth("A", 1)).toBe(5);
      expect(calculateBitmapTextWidth("AB", 1)).toBe(11);
      expect(calculateBitmapTextWidth("A B", 1)).toBe(17);
    });

    it("should scale width", () => {
      expect(calculateBitmapTextWidth("A", 2)).toBe(10);
      expect(calculateBitmapTextWidth("AB", 3)).toBe(33);
    });
  });

  describe("calculateBitmapTextHeight", () => {
    it("should be seven rows per scale step", () => {
      expect(calculateBitmapTextHeight(1)).toBe(7);
      expect(calculateBitmapTextHeight(3)).toBe(21);
    });
  });

  describe("fitBitmapTextScale", () => {
    it("should pick the largest scale that fits", () => {
      // "12:00" is 29 px wide at scale 1
      expect(fitBitmapTextScale("12:00", 100, 100)).toBe(3);
      expect(fitBitmapTextScale("12:00", 200, 30)).toBe(4);
    });

    it("should never go below 1", () => {
      expect(fitBitmapTextScale("LONG TEXT", 5, 5)).toBe(1);
    });
  });

  describe("renderBitmapText", () => {
    it("should draw the glyph pattern", () => {
      const bitmap = blank(5, 7);

      renderBitmapText(bitmap, "L", 0, 0);

      // "L" is a left column of 7 and a bottom row of 5, sharing a corner
      expect(black(bitmap)).toBe(11);
      expect(BitmapUtils.getPixel(bitmap, 0, 0)).toBe(true);
      expect(BitmapUtils.getPixel(bitmap, 4, 6)).toBe(true);
      expect(BitmapUtils.getPixel(bitmap, 4, 0)).toBe(false);
    });

    it("should move the text to the given position", () => {
      const bitmap = blank(20, 20);

      renderBitmapText(bitmap, "L", 10, 5);

      expect(black(bitmap)).toBe(11);
      expect(BitmapUtils.getPixel(bitmap, 10, 5)).toBe(true);
      expect(BitmapUtils.getPixel(bitmap, 0, 0)).toBe(false);
    });

    it("should scale each pixel to a block", () => {
      const bitmap = blank(20, 20);

      renderBitmapText(bitmap, "L", 0, 0, { scale: 2 });

      expect(black(bitmap)).toBe(44);
    });

    it("should add pixels for bold and more for extra bold", () => {
      const normal = blank(20, 20);
      const bold = blank(20, 20);
      const extraBold = blank(20, 20);

      renderBitmapText(normal, "A", 0, 0);
      renderBitmapText(bold, "A", 0, 0, { bold: true });
      renderBitmapText(extraBold, "A", 0, 0, { extraBold: true });

      expect(black(bold)).toBeGreaterThan(black(normal));
      expect(black(extraBold)).toBeGreaterThan(black(bold));
    });

    it("should draw lowercase as uppercase", () => {
      const lower = blank(50, 20);
      const upper = blank(50, 20);

      renderBitmapText(lower, "abc", 0, 0);
      renderBitmapText(upper, "ABC", 0, 0);

      expect(sameData(lower.data, upper.data)).toBe(true);
    });

    it("should draw every digit differently", () => {
      const digits = Array.from({ length: 10 }, (_, i) => {
        const bitmap = blank(8, 8);
        renderBitmapText(bitmap, String(i), 0, 0);
        return bitmap;
      });

      for (let i = 0; i < 10; i++) {
        expect(black(digits[i])).toBeGreaterThan(0);
        for (let j = i + 1; j < 10; j++) {
          expect(sameData(digits[i].data, digits[j].data)).toBe(false);
        }
      }
    });

    it("should skip characters without a glyph but keep their advance", () => {
      const withUnknown = blank(30, 10);
      const withSpace = blank(30, 10);

      renderBitmapText(withUnknown, "A@B", 0, 0);
      renderBitmapText(withSpace, "A B", 0, 0);

      expect(sameData(withUnknown.data, withSpace.data)).toBe(true);
    });

    it("should clip text outside the bitmap", () => {
      const bitmap = blank(10, 10);

      expect(() => renderBitmapText(bitmap, "HELLO", -3, -2)).not.toThrow();
      expect(black(bitmap)).toBeGreaterThan(0);
    });

    it("should leave the bitmap untouched for empty text", () => {
      const bitmap = blank(20, 10);

      renderBitmapText(bitmap, "", 0, 0);

      expect(black(bitmap)).toBe(0);
    });
  });
});
