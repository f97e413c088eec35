import { describe, it, expect, vi } from "vitest";
import type { ISampleSource, Logger, SampleBatch } from "@neurocue/contracts";
import { BusError, parseRuntimeConfig } from "@neurocue/contracts";
import { InMemoryBus } from "@neurocue/adapters";
import { Runtime } from "../src/Runtime";

/**
 * Source that never produces anything unless told to.
 */
class IdleSource implements ISampleSource {
  readonly source = "idle";
  started = false;
  private listeners: Array<(batch: SampleBatch) => void> = [];

  onBatch(callback: (batch: SampleBatch) => void): () => void {
    this.listeners.push(callback);
    return () => {
      this.listeners = this.listeners.filter((listener) => listener !== callback);
    };
  }

  start(): void {
    this.started = true;
  }

  stop(): void {
    this.started = false;
  }
}

function capturingLoggers() {
  const warnings: string[] = [];
  const createLogger = (tag: string): Logger => ({
    debug: () => {},
    info: () => {},
    warn: (message) => warnings.push(`[${tag}] ${message}`),
    error: () => {},
  });
  return { warnings, createLogger };
}

const config = parseRuntimeConfig({
  readySeconds: 0.05,
  restSeconds: 0.2,
  pollIntervalMs: 1,
  receiveTimeoutMs: 10,
  acquisitionStallSeconds: 10,
});

describe("Runtime", () => {
  it("delivers the initial status to the status sink", async () => {
    const source = new IdleSource();
    const { createLogger } = capturingLoggers();
    const runtime = new Runtime({ config, source, createLogger });
    const running = runtime.run();

    await vi.waitFor(() => expect(runtime.statusSink.history).toEqual(["RED"]));
    expect(source.started).toBe(true);

    runtime.stop();
    await running;
    expect(source.started).toBe(false);
    expect(runtime.bus.closed).toBe(true);
  });

  it("turns a blink and a clench into a NEXT command", async () => {
    const { createLogger } = capturingLoggers();
    const runtime = new Runtime({ config, source: new IdleSource(), createLogger });
    const running = runtime.run();

    await vi.waitFor(() => expect(runtime.statusSink.history).toEqual(["RED"]));
    runtime.bus.publish("blink-event", { triggered: true });
    await vi.waitFor(() => expect(runtime.statusSink.history).toEqual(["RED", "GREEN"]));

    runtime.bus.publish("move-event", { direction: 1 });
    await vi.waitFor(() => expect(runtime.commandSink.history).toEqual(["NEXT"]));
    await vi.waitFor(() =>
      expect(runtime.statusSink.history).toEqual(["RED", "GREEN", "ORANGE", "RED"])
    );

    runtime.stop();
    await running;
  });

  it("rejects when workers cannot subscribe", async () => {
    const bus = new InMemoryBus();
    bus.close();
    const source = new IdleSource();
    const { createLogger, warnings } = capturingLoggers();
    const runtime = new Runtime({ config, source, bus, createLogger });

    await expect(runtime.run()).rejects.toBeInstanceOf(BusError);
    expect(source.started).toBe(false);
    expect(warnings[0]).toMatch(/^\[Runtime\] Worker status failed: /);
  });

  it("shuts everything down when a worker stops on its own", async () => {
    const { createLogger, warnings } = capturingLoggers();
    const runtime = new Runtime({ config, source: new IdleSource(), createLogger });
    const running = runtime.run();

    await vi.waitFor(() => expect(runtime.statusSink.history).toEqual(["RED"]));
    runtime.bus.close();
    await running;

    expect(runtime.workers().every((worker) => !worker.running)).toBe(true);
    expect(warnings.some((line) => line.startsWith("[Runtime] Worker ") && line.endsWith(" stopped; shutting down"))).toBe(true);
  });

  it("can only be run once", async () => {
    const { createLogger } = capturingLoggers();
    const runtime = new Runtime({ config, source: new IdleSource(), createLogger });
    const running = runtime.run();

    await expect(runtime.run()).rejects.toThrow("Runtime has already been started");
    runtime.stop();
    await running;
  });
});
