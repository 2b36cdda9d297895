import { ProviderConfig } from "@core/types";
import { createProvider, createProviderRegistry } from "../providerFactory";
import { HttpJsonProvider } from "../HttpJsonProvider";
import { StaticProvider } from "../StaticProvider";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const base: Omit<ProviderConfig, "kind" | "options"> = {
  enabled: true,
  refreshIntervalSeconds: 60,
  maxAgeSeconds: 120,
  fetchTimeoutSeconds: 5,
};

describe("providerFactory", () => {
  it("should build a static provider that returns its payload", async () => {
    const provider = createProvider("note", {
      ...base,
      kind: "static",
      options: { payload: { text: "hello" } },
    });

    expect(provider).toBeInstanceOf(StaticProvider);
    expect(await provider.fetch()).toEqual({
      success: true,
      data: { text: "hello" },
    });
  });

  it("should build an http provider", () => {
    const provider = createProvider("weather", {
      ...base,
      kind: "http_json",
      options: { url: "http://localhost/w" },
    });

    expect(provider).toBeInstanceOf(HttpJsonProvider);
    expect(provider.name).toBe("weather");
  });

  it("should create slots for enabled providers only", () => {
    const registry = createProviderRegistry({
      note: { ...base, kind: "static", options: { payload: {} } },
      off: { ...base, enabled: false, kind: "static", options: {} },
    });

    expect(registry.names()).toEqual(["note"]);
    expect(registry.listStatus()[0]).toMatchObject({
      maxAgeMs: 120_000,
      refreshIntervalMs: 60_000,
    });
  });
});
