import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "../observability/logger.js";
import { ShutdownCoordinator, type DrainableServer } from "./ShutdownCoordinator.js";
import { StopSignal } from "./StopSignal.js";

function fakeServer() {
  let onClosed: ((error?: Error) => void) | undefined;
  const server = {
    close: vi.fn((callback?: (error?: Error) => void) => {
      onClosed = callback;
    }),
    closeAllConnections: vi.fn()
  } satisfies DrainableServer;
  return {
    server,
    finishDrain: (error?: Error) => onClosed?.(error)
  };
}

describe("ShutdownCoordinator", () => {
  const logger = createLogger("silent");

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("closes the stop signal before draining the listener", async () => {
    const stopSignal = new StopSignal();
    const { server } = fakeServer();
    const order: string[] = [];
    stopSignal.signal.addEventListener("abort", () => order.push("signal"));
    server.close.mockImplementation((callback?: (error?: Error) => void) => {
      order.push("close");
      callback?.();
    });

    const coordinator = new ShutdownCoordinator({ stopSignal, server, logger });
    const result = await coordinator.shutdown("SIGINT");

    expect(order).toEqual(["signal", "close"]);
    expect(result).toEqual({ reason: "SIGINT", outcome: "drained" });
    expect(server.closeAllConnections).not.toHaveBeenCalled();
  });

  it("waits for beforeDrain between the signal and the drain", async () => {
    const stopSignal = new StopSignal();
    const { server, finishDrain } = fakeServer();
    let releaseReporter: () => void = () => {};
    const reporterDone = new Promise<void>(resolve => {
      releaseReporter = resolve;
    });

    const coordinator = new ShutdownCoordinator({
      stopSignal,
      server,
      logger,
      beforeDrain: () => reporterDone
    });
    const pending = coordinator.shutdown();

    expect(stopSignal.closed).toBe(true);
    expect(server.close).not.toHaveBeenCalled();

    releaseReporter();
    await vi.waitFor(() => {
      expect(server.close).toHaveBeenCalledTimes(1);
    });

    finishDrain();
    await expect(pending).resolves.toEqual({ reason: "shutdown requested", outcome: "drained" });
  });

  it("abandons open connections once the timeout elapses", async () => {
    const stopSignal = new StopSignal();
    const { server } = fakeServer();
    const coordinator = new ShutdownCoordinator({ stopSignal, server, logger, timeoutMs: 5000 });

    const pending = coordinator.shutdown("SIGTERM");
    await vi.advanceTimersByTimeAsync(4999);
    expect(server.closeAllConnections).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);

    await expect(pending).resolves.toEqual({ reason: "SIGTERM", outcome: "timed_out" });
    expect(server.closeAllConnections).toHaveBeenCalledTimes(1);
  });

  it("shuts down once for repeated and concurrent triggers", async () => {
    const stopSignal = new StopSignal();
    const closeSpy = vi.spyOn(stopSignal, "close");
    const { server, finishDrain } = fakeServer();
    const coordinator = new ShutdownCoordinator({ stopSignal, server, logger });

    expect(coordinator.state).toBe("running");
    const first = coordinator.shutdown("SIGINT");
    const second = coordinator.shutdown("SIGTERM");
    expect(coordinator.state).toBe("draining");
    expect(second).toBe(first);

    finishDrain();
    await first;
    const third = coordinator.shutdown("SIGINT");

    expect(third).toBe(first);
    await expect(third).resolves.toEqual({ reason: "SIGINT", outcome: "drained" });
    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(server.close).toHaveBeenCalledTimes(1);
    expect(coordinator.state).toBe("draining");
  });

  it("treats a listener close error as a finished drain", async () => {
    const stopSignal = new StopSignal();
    const { server, finishDrain } = fakeServer();
    const coordinator = new ShutdownCoordinator({ stopSignal, server, logger });

    const pending = coordinator.shutdown();
    finishDrain(new Error("Server is not running."));

    await expect(pending).resolves.toMatchObject({ outcome: "drained" });
  });
});
