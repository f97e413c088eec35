/**
 * Runtime
 *
 * Wires one process: an in-memory bus, the session worker, one worker
 * per detector, the console sinks, and the acquisition relay.
 *
 * Start order: sinks, session, detectors, relay. The status topic keeps
 * nothing for late subscribers, so the sinks have to be listening before
 * the session publishes its initial status.
 *
 * If any worker ends on its own (setup failure, bus closed), everything
 * else is stopped and the bus is closed.
 */

import type {
  IClock,
  IMessageBus,
  ISampleSource,
  IWorker,
  Logger,
  RuntimeConfig,
} from "@neurocue/contracts";
import { createConsoleLogger, describeError, secondsToMs } from "@neurocue/contracts";
import { AcquisitionRelay, InMemoryBus, SyntheticSampleSource } from "@neurocue/adapters";
import {
  DetectorWorker,
  SessionWorker,
  SystemClock,
  createBlinkDetector,
  createGestureDetector,
  createSessionStateMachine,
} from "@neurocue/engine";
import { CommandLogWorker } from "./sinks/CommandLogWorker";
import { StatusLogWorker } from "./sinks/StatusLogWorker";

export interface RuntimeOptions {
  config: RuntimeConfig;

  /** @default a SyntheticSampleSource with no artifacts */
  source?: ISampleSource;

  /** @default a new InMemoryBus sized from config */
  bus?: IMessageBus;

  clock?: IClock;

  /** One logger per component tag. @default createConsoleLogger */
  createLogger?: (tag: string) => Logger;
}

interface WorkerExit {
  worker: IWorker;
  error: unknown;
}

export class Runtime {
  readonly bus: IMessageBus;
  readonly session: SessionWorker;
  readonly detectors: readonly DetectorWorker[];
  readonly statusSink: StatusLogWorker;
  readonly commandSink: CommandLogWorker;
  readonly relay: AcquisitionRelay;

  private logger: Logger;
  private started = false;
  private stopping = false;

  constructor(options: RuntimeOptions) {
    const { config } = options;
    const createLogger = options.createLogger ?? createConsoleLogger;
    const clock = options.clock ?? new SystemClock();
    this.logger = createLogger("Runtime");

    this.bus =
      options.bus ??
      new InMemoryBus({
        queueCapacity: config.queueCapacity,
        queueOverflow: config.queueOverflow,
        logger: createLogger("Bus"),
      });

    const common = { clock, pollIntervalMs: config.pollIntervalMs };
    const receive = { receiveTimeoutMs: config.receiveTimeoutMs };

    this.statusSink = new StatusLogWorker(this.bus, {
      ...common,
      ...receive,
      logger: createLogger("Status"),
    });
    this.commandSink = new CommandLogWorker(this.bus, {
      ...common,
      ...receive,
      logger: createLogger("Command"),
    });

    this.session = new SessionWorker(createSessionStateMachine(config), this.bus, {
      ...common,
      logger: createLogger("Session"),
    });

    this.detectors = [createBlinkDetector(config), createGestureDetector(config)].map(
      (detector) =>
        new DetectorWorker(detector, this.bus, {
          ...common,
          ...receive,
          stallSeconds: config.acquisitionStallSeconds,
          logger: createLogger(detector.id === "blink" ? "Blink" : "Gesture"),
        })
    );

    const source =
      options.source ??
      new SyntheticSampleSource({
        channels: [...new Set([...config.moveChannels, ...config.blinkChannels])],
        sampleRate: config.sampleRate,
        batchSeconds: config.batchSeconds,
        clock,
      });
    this.relay = new AcquisitionRelay(source, this.bus, { logger: createLogger("Acquisition") });
  }

  /** Workers in start order. */
  workers(): IWorker[] {
    return [this.statusSink, this.commandSink, this.session, ...this.detectors];
  }

  /**
   * Start everything and resolve once every worker has stopped.
   * Rejects with the first worker error, e.g. a failed subscribe.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error("Runtime has already been started");
    }
    this.started = true;

    const exits = this.workers().map((worker) =>
      worker.run().then(
        (): WorkerExit => ({ worker, error: null }),
        (error: unknown): WorkerExit => ({ worker, error })
      )
    );
    if (!this.bus.closed) {
      this.relay.start();
    }

    const first = await Promise.race(exits);
    if (!this.stopping) {
      const reason = first.error === null ? "stopped" : `failed: ${describeError(first.error)}`;
      this.logger.warn(`Worker ${first.worker.id} ${reason}; shutting down`);
    }
    this.stop();

    const results = await Promise.all(exits);
    const failed = results.find((exit) => exit.error !== null);
    if (failed) {
      throw failed.error;
    }
    this.logger.info("All workers stopped");
  }

  /**
   * Stop acquisition, signal every worker and close the bus. Idempotent.
   */
  stop(): void {
    if (this.stopping) return;
    this.stopping = true;
    this.relay.stop();
    for (const worker of this.workers()) {
      worker.stop();
    }
    if (!this.bus.closed) {
      this.bus.close();
    }
  }

  /**
   * Stop after `seconds`, unless stopped earlier. Returns a cancel function.
   */
  stopAfter(seconds: number): () => void {
    const timer = setTimeout(() => this.stop(), secondsToMs(seconds));
    return () => clearTimeout(timer);
  }
}
