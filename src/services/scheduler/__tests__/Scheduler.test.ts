import { NotFoundErrorCode } from "@core/errors";
import { Scheduler } from "../Scheduler";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("Scheduler", () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    jest.useFakeTimers({ now: 0 });
    scheduler = new Scheduler(() => Date.now());
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe("cadence", () => {
    it("should fire a job every cadence", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("a", 1000, handler);
      scheduler.start();

      await jest.advanceTimersByTimeAsync(999);
      expect(handler).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      expect(handler).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(2500);
      expect(handler).toHaveBeenCalledTimes(3);
    });

    it("should fire an immediate job on the next loop turn", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.start();
      scheduler.addJob("a", 1000, handler, { immediate: true });

      await jest.advanceTimersByTimeAsync(0);
      expect(handler).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(1000);
      expect(handler).toHaveBeenCalledTimes(2);
    });

    it("should drive jobs with different cadences from one timer", async () => {
      const fast = jest.fn().mockResolvedValue(undefined);
      const slow = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("fast", 100, fast);
      scheduler.addJob("slow", 250, slow);
      scheduler.start();

      await jest.advanceTimersByTimeAsync(1000);

      expect(fast).toHaveBeenCalledTimes(10);
      expect(slow).toHaveBeenCalledTimes(4);
    });

    it("should wait out a cadence longer than one timer can hold", async () => {
      const thirtyDays = 30 * 24 * 60 * 60 * 1000;
      const handler = jest.fn().mockResolvedValue(undefined);
      const setTimeoutSpy = jest.spyOn(global, "setTimeout");
      scheduler.addJob("monthly", thirtyDays, handler);
      scheduler.start();

      expect(setTimeoutSpy).toHaveBeenLastCalledWith(
        expect.any(Function),
        2147483647,
      );

      await jest.advanceTimersByTimeAsync(thirtyDays - 1);
      expect(handler).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(setTimeoutSpy.mock.calls.length).toBeLessThan(5);

      setTimeoutSpy.mockRestore();
    });

    it("should not fire before start or after stop", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("a", 100, handler);

      await jest.advanceTimersByTimeAsync(500);
      expect(handler).not.toHaveBeenCalled();

      scheduler.start();
      await jest.advanceTimersByTimeAsync(100);
      expect(handler).toHaveBeenCalledTimes(1);

      scheduler.stop();
      await jest.advanceTimersByTimeAsync(500);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });
  });

  describe("stall recovery", () => {
    it("should fire a long-delayed job once and resume from the fire time", async () => {
      let clock = 0;
      const stalled = new Scheduler(() => clock);
      const handler = jest.fn().mockResolvedValue(undefined);
      stalled.addJob("a", 1000, handler);
      stalled.start();

      // the loop wakes up ten cadences late
      clock = 10_500;
      await jest.advanceTimersByTimeAsync(1000);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(stalled.listJobs()[0].nextFireAt).toEqual(new Date(11_500));
      stalled.stop();
    });
  });

  describe("overlap", () => {
    it("should skip ticks while the previous run is pending", async () => {
      let release: () => void = () => undefined;
      const handler = jest.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );
      scheduler.addJob("slow", 100, handler);
      scheduler.start();

      await jest.advanceTimersByTimeAsync(350);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(scheduler.listJobs()[0].running).toBe(true);

      release();
      await jest.advanceTimersByTimeAsync(100);

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it("should keep firing after a handler fails", async () => {
      const handler = jest
        .fn()
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValue(undefined);
      scheduler.addJob("flaky", 100, handler);
      scheduler.start();

      await jest.advanceTimersByTimeAsync(100);
      await jest.advanceTimersByTimeAsync(100);

      expect(handler).toHaveBeenCalledTimes(2);
      expect(scheduler.listJobs()[0].running).toBe(false);
    });
  });

  describe("runNow", () => {
    it("should run immediately without moving nextFireAt", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("a", 1000, handler);
      scheduler.start();
      await jest.advanceTimersByTimeAsync(300);

      const outcome = await scheduler.runNow("a");

      expect(outcome.success).toBe(true);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(scheduler.listJobs()[0].nextFireAt).toEqual(new Date(1000));
    });

    it("should not start a second run while one is pending", async () => {
      let release: () => void = () => undefined;
      const handler = jest.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );
      scheduler.addJob("a", 1000, handler);

      const first = scheduler.runNow("a");
      const second = await scheduler.runNow("a");

      expect(second.success).toBe(true);
      expect(handler).toHaveBeenCalledTimes(1);
      release();
      await first;
    });

    it("should return NotFoundError for an unknown key", async () => {
      const outcome = await scheduler.runNow("ghost");

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe(NotFoundErrorCode.JOB);
      }
    });
  });

  describe("job management", () => {
    it("should list jobs ordered by next fire time", () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("later", 5000, handler);
      scheduler.addJob("sooner", 1000, handler);

      expect(scheduler.listJobs()).toEqual([
        {
          key: "sooner",
          cadenceMs: 1000,
          nextFireAt: new Date(1000),
          running: false,
        },
        {
          key: "later",
          cadenceMs: 5000,
          nextFireAt: new Date(5000),
          running: false,
        },
      ]);
    });

    it("should replace a job added under the same key", async () => {
      const first = jest.fn().mockResolvedValue(undefined);
      const second = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("a", 100, first);
      scheduler.addJob("a", 100, second);
      scheduler.start();

      await jest.advanceTimersByTimeAsync(100);

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it("should remove jobs by key and by prefix", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.addJob("provider:a", 100, handler);
      scheduler.addJob("provider:b", 100, handler);
      scheduler.addJob("rotation", 100, handler);

      expect(scheduler.removeJobs("provider:")).toBe(2);
      expect(scheduler.removeJob("rotation")).toBe(true);
      expect(scheduler.removeJob("rotation")).toBe(false);
      expect(scheduler.hasJob("provider:a")).toBe(false);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(500);
      expect(handler).not.toHaveBeenCalled();
    });
  });
});
