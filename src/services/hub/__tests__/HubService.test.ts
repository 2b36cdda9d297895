import { ConfigError, ConfigErrorCode, NotFoundErrorCode } from "@core/errors";
import { IConfigService } from "@core/interfaces";
import { DisplayMode, HubConfig, success, failure } from "@core/types";
import { validateConfig } from "@services/config/configSchema";
import { MockDisplayTransport } from "@services/display/MockDisplayTransport";
import { HubService } from "../HubService";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    time: jest.fn(),
    timeEnd: jest.fn(),
  }),
}));

jest.mock("@services/display/FramePreview", () => ({
  bitmapToPng: jest.fn().mockResolvedValue(Buffer.from("png-bytes")),
}));

const rawConfig = (): Record<string, unknown> => ({
  display: { width: 64, height: 32, mockLatencyMs: 0 },
  schedule: {
    rotationIntervalSeconds: 60,
    layoutSequence: ["home", "agenda"],
  },
  providers: {
    greeting: {
      kind: "static",
      refreshIntervalSeconds: 120,
      options: { payload: { text: "hi" } },
    },
  },
  layouts: {
    home: {
      widgets: [
        {
          type: "value",
          region: { x: 0, y: 0, width: 64, height: 32 },
          providers: ["greeting"],
          options: { field: "text" },
        },
      ],
    },
    agenda: {
      widgets: [
        {
          type: "text",
          region: { x: 0, y: 0, width: 64, height: 16 },
          options: { text: "AGENDA" },
        },
      ],
    },
  },
});

const loadConfig = (raw: unknown): HubConfig => {
  const result = validateConfig(raw);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
};

const flush = (): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, 10));

describe("HubService", () => {
  let transport: MockDisplayTransport;
  let hub: HubService;
  let clock: Date;

  beforeEach(() => {
    clock = new Date(2024, 0, 1, 12, 0);
    transport = new MockDisplayTransport(64, 32);
    hub = new HubService(loadConfig(rawConfig()), {
      transport,
      now: () => clock,
    });
  });

  afterEach(async () => {
    await hub.stop();
  });

  describe("start", () => {
    it("should warm providers and schedule their refresh jobs", async () => {
      await hub.start();

      const status = hub.getStatus();
      expect(status.mode).toBe(DisplayMode.MANUAL);
      expect(status.currentLayout).toBeNull();
      expect(status.providerStatuses).toHaveLength(1);
      expect(status.providerStatuses[0].name).toBe("greeting");
      expect(status.providerStatuses[0].staleness).toBe("fresh");
      expect(hub.listJobs().map((job) => job.key)).toEqual([
        "provider:greeting",
      ]);
      expect(hub.listJobs()[0].cadenceMs).toBe(120_000);
    });

    it("should apply the configured mode", async () => {
      const raw = rawConfig();
      raw.schedule = {
        mode: "auto_rotate",
        rotationIntervalSeconds: 60,
        layoutSequence: ["home", "agenda"],
      };
      hub = new HubService(loadConfig(raw), { transport, now: () => clock });

      await hub.start();
      await flush();

      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
      expect(hub.listJobs().map((job) => job.key).sort()).toEqual([
        "provider:greeting",
        "rotation",
      ]);
      expect(hub.getStatus().currentLayout).toBe("agenda");
    });

    it("should keep a mode chosen before start", async () => {
      hub.setMode("auto_rotate");

      await hub.start();

      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
      expect(hub.listJobs().some((job) => job.key === "rotation")).toBe(true);
    });
  });

  describe("triggerDisplay", () => {
    it("should display a known layout", async () => {
      await hub.start();

      const result = hub.triggerDisplay("home");
      await flush();

      expect(result.success).toBe(true);
      expect(transport.getPushCount()).toBe(1);
      const status = hub.getStatus();
      expect(status.currentLayout).toBe("home");
      expect(status.display.deliveredCount).toBe(1);
      expect(status.display.lastDelivery?.degraded).toBe(false);
    });

    it("should reject an unknown layout", async () => {
      await hub.start();

      const result = hub.triggerDisplay("garage");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(NotFoundErrorCode.LAYOUT);
      }
    });
  });

  describe("setMode", () => {
    it("should reject an unknown mode", () => {
      const result = hub.setMode("sometimes");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.INVALID_VALUE);
        expect(result.error.message).toBe(
          "Invalid value for mode: sometimes (expected: manual or auto_rotate)",
        );
      }
      expect(hub.getStatus().mode).toBe(DisplayMode.MANUAL);
    });

    it("should reject auto-rotate with an empty sequence", () => {
      const raw = rawConfig();
      raw.schedule = { layoutSequence: [] };
      hub = new HubService(loadConfig(raw), { transport, now: () => clock });

      const result = hub.setMode("auto_rotate");

      expect(result.success).toBe(false);
      expect(hub.getStatus().mode).toBe(DisplayMode.MANUAL);
    });

    it("should switch between modes", () => {
      expect(hub.setMode("auto_rotate").success).toBe(true);
      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
      expect(hub.listJobs().some((job) => job.key === "rotation")).toBe(true);

      expect(hub.setMode("manual").success).toBe(true);
      expect(hub.getStatus().mode).toBe(DisplayMode.MANUAL);
      expect(hub.listJobs().some((job) => job.key === "rotation")).toBe(false);
    });
  });

  describe("refreshProvider", () => {
    it("should run the provider job now", async () => {
      await hub.start();
      clock = new Date(2024, 0, 1, 12, 30);

      const result = hub.refreshProvider("greeting");
      await flush();

      expect(result.success).toBe(true);
      expect(hub.getStatus().providerStatuses[0].lastFetchedAt).toEqual(
        new Date(2024, 0, 1, 12, 30),
      );
    });

    it("should reject an unknown provider", () => {
      const result = hub.refreshProvider("tides");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(NotFoundErrorCode.PROVIDER);
        expect(result.error.message).toBe("Unknown provider: tides");
      }
    });
  });

  describe("reloadConfig", () => {
    it("should leave layouts and mode unchanged when invalid", () => {
      hub.setMode("auto_rotate");

      const result = hub.reloadConfig({ layouts: { x: { widgets: "no" } } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.INVALID_CONFIG);
      }
      expect(hub.listLayouts()).toEqual(["home", "agenda"]);
      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
    });

    it("should swap layouts and replace provider jobs", async () => {
      await hub.start();
      const raw = rawConfig();
      raw.providers = {
        weather: { kind: "static", options: { payload: { temp: 21 } } },
      };
      raw.layouts = {
        weather: {
          widgets: [
            {
              type: "value",
              region: { x: 0, y: 0, width: 64, height: 32 },
              providers: ["weather"],
              options: { field: "temp" },
            },
          ],
        },
      };
      raw.schedule = { layoutSequence: ["weather"] };

      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(true);
      expect(hub.listLayouts()).toEqual(["weather"]);
      expect(hub.listJobs().map((job) => job.key)).toEqual([
        "provider:weather",
      ]);
      expect(hub.getStatus().providerStatuses.map((s) => s.name)).toEqual([
        "weather",
      ]);
      expect(hub.refreshProvider("greeting").success).toBe(false);
    });

    it("should keep auto-rotate and restart from the first layout", async () => {
      await hub.start();
      hub.setMode("auto_rotate");
      await flush();
      expect(hub.getStatus().display.rotationIndex).toBe(1);

      const raw = rawConfig();
      raw.schedule = {
        rotationIntervalSeconds: 60,
        layoutSequence: ["agenda", "home"],
      };
      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(true);
      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
      expect(hub.getStatus().display.rotationIndex).toBe(0);

      await flush();
      expect(hub.getStatus().currentLayout).toBe("home");
    });

    it("should reject a change of display size", () => {
      const raw = rawConfig();
      raw.display = { width: 128, height: 32 };

      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.INVALID_VALUE);
      }
      expect(hub.listLayouts()).toEqual(["home", "agenda"]);
    });

    it("should substitute environment variables before validating", () => {
      hub = new HubService(loadConfig(rawConfig()), {
        transport,
        env: { WEATHER_URL: "https://weather.test/now.json" },
        now: () => clock,
      });
      const raw = rawConfig();
      raw.providers = {
        weather: {
          kind: "http_json",
          options: { url: "${WEATHER_URL}" },
        },
      };
      raw.layouts = {
        home: { widgets: [] },
        agenda: { widgets: [] },
      };

      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(true);
      expect(hub.listJobs().map((job) => job.key)).toEqual([
        "provider:weather",
      ]);
    });

    it("should reject a tree naming an unset variable", () => {
      hub = new HubService(loadConfig(rawConfig()), {
        transport,
        env: {},
        now: () => clock,
      });
      const raw = rawConfig();
      raw.providers = {
        weather: {
          kind: "http_json",
          options: { url: "${WEATHER_URL}" },
        },
      };

      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.MISSING_ENV_VAR);
      }
      expect(hub.listJobs().map((job) => job.key)).toEqual([
        "provider:greeting",
      ]);
    });

    it("should reject an empty sequence while auto-rotating", () => {
      hub.setMode("auto_rotate");
      const raw = rawConfig();
      raw.schedule = { layoutSequence: [] };

      const result = hub.reloadConfig(raw);

      expect(result.success).toBe(false);
      expect(hub.getStatus().mode).toBe(DisplayMode.AUTO_ROTATE);
    });
  });

  describe("reloadFromFile", () => {
    const configServiceReturning = (
      result: Awaited<ReturnType<IConfigService["load"]>>,
    ): IConfigService => ({
      getConfigPath: () => "./config/test.json",
      load: jest.fn().mockResolvedValue(result),
    });

    it("should swap in the configuration read from disk", async () => {
      const raw = rawConfig();
      raw.layouts = {
        home: { widgets: [] },
        agenda: { widgets: [] },
        garden: { widgets: [] },
      };
      hub = new HubService(loadConfig(rawConfig()), {
        transport,
        configService: configServiceReturning(success(loadConfig(raw))),
        now: () => clock,
      });

      const result = await hub.reloadFromFile();

      expect(result.success).toBe(true);
      expect(hub.listLayouts()).toEqual(["home", "agenda", "garden"]);
    });

    it("should keep the active configuration when loading fails", async () => {
      hub = new HubService(loadConfig(rawConfig()), {
        transport,
        configService: configServiceReturning(
          failure(ConfigError.fileNotFound("./config/test.json")),
        ),
        now: () => clock,
      });

      const result = await hub.reloadFromFile();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.FILE_NOT_FOUND);
      }
      expect(hub.listLayouts()).toEqual(["home", "agenda"]);
    });
  });

  describe("getPreview", () => {
    it("should report that nothing has been rendered", async () => {
      const result = await hub.getPreview();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(NotFoundErrorCode.FRAME);
      }
    });

    it("should encode the last frame", async () => {
      await hub.start();
      hub.triggerDisplay("agenda");
      await flush();

      const result = await hub.getPreview();

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.toString()).toBe("png-bytes");
      }
    });
  });
});
