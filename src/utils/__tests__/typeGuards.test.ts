import { DisplayMode } from "@core/types";
import { FetchError } from "@core/errors/FetchError";
import { NotFoundError } from "@core/errors/NotFoundError";
import {
  toError,
  isNodeJSErrnoException,
  isRecord,
  isDisplayMode,
  isBaseError,
  extractErrorInfo,
} from "../typeGuards";

describe("typeGuards", () => {
  describe("toError", () => {
    it("should return Error instances unchanged", () => {
      const error = new Error("test error");
      expect(toError(error)).toBe(error);
    });

    it("should preserve custom Error subclasses", () => {
      const error = FetchError.timeout("p", 10);
      expect(toError(error)).toBe(error);
    });

    it("should convert strings and message objects", () => {
      expect(toError("string error").message).toBe("string error");
      expect(toError({ message: "object error" }).message).toBe(
        "object error",
      );
    });

    it("should stringify anything else", () => {
      expect(toError(42).message).toBe("42");
      expect(toError(null).message).toBe("null");
      expect(toError(undefined).message).toBe("undefined");
    });
  });

  describe("isNodeJSErrnoException", () => {
    it("should accept errors carrying a code", () => {
      const error = Object.assign(new Error("ENOENT"), { code: "ENOENT" });
      expect(isNodeJSErrnoException(error)).toBe(true);
    });

    it("should reject plain errors and non-errors", () => {
      expect(isNodeJSErrnoException(new Error("x"))).toBe(false);
      expect(isNodeJSErrnoException({ code: "ENOENT" })).toBe(false);
    });
  });

  describe("isRecord", () => {
    it("should accept plain objects only", () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord("x")).toBe(false);
    });
  });

  describe("isDisplayMode", () => {
    it("should accept the two mode strings", () => {
      expect(isDisplayMode("manual")).toBe(true);
      expect(isDisplayMode(DisplayMode.AUTO_ROTATE)).toBe(true);
      expect(isDisplayMode("sideways")).toBe(false);
      expect(isDisplayMode(undefined)).toBe(false);
    });
  });

  describe("isBaseError", () => {
    it("should recognise hub errors", () => {
      expect(isBaseError(NotFoundError.layout("x"))).toBe(true);
      expect(isBaseError(new Error("x"))).toBe(false);
    });
  });

  describe("extractErrorInfo", () => {
    it("should use the code and user message of hub errors", () => {
      expect(extractErrorInfo(NotFoundError.layout("x"))).toEqual({
        code: "NOT_FOUND_LAYOUT",
        message: "No layout with that name.",
      });
    });

    it("should fall back for other values", () => {
      expect(extractErrorInfo(new Error("boom"))).toEqual({
        code: "UNKNOWN_ERROR",
        message: "boom",
      });
      expect(extractErrorInfo("text")).toEqual({
        code: "UNKNOWN_ERROR",
        message: "text",
      });
    });
  });
});
