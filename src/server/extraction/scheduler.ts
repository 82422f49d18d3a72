import type { MethodCatalog, MethodSpec } from "./method-catalog.js";
import type { FetchOutcome } from "./fetcher.js";
import type { Event, PublishResult } from "./publisher.js";
import type { ShutdownSignal } from "./shutdown-signal.js";
import type { MetricsRecorder } from "../metrics/rpc-metrics.js";
import type { RpcMethodName } from "../../types/rpc-methods.js";
import { errorMessage } from "../../core/errors.js";

export type SchedulerState = "idle" | "dispatching" | "draining" | "stopped";

export interface MethodFetcher {
  fetch(spec: MethodSpec): Promise<FetchOutcome>;
}

export interface EventPublisher {
  publish(event: Event): Promise<PublishResult>;
}

export interface SchedulerDeps {
  catalog: MethodCatalog;
  fetcher: MethodFetcher;
  publisher: EventPublisher;
  metrics: MetricsRecorder;
  shutdown: ShutdownSignal;
  /** Base tick */
  intervalMs: number;
}

/**
 * Drives the extraction: every base tick the due methods are fetched
 * concurrently, each result is timed and counted, and successes are published.
 *
 * - A method with cadence multiplier k fires on ticks k, 2k, 3k, ...
 * - At most one call per method is in flight. A method that is due while its
 *   previous call is still running is skipped and fires on the first later
 *   tick where it is free.
 * - One method's failure never affects another method.
 * - Once the shutdown signal is set no new call is started; run() resolves
 *   after the calls already in flight have resolved and been recorded.
 */
export class Scheduler {
  private readonly catalog: MethodCatalog;
  private readonly fetcher: MethodFetcher;
  private readonly publisher: EventPublisher;
  private readonly metrics: MetricsRecorder;
  private readonly shutdown: ShutdownSignal;
  private readonly intervalMs: number;

  // Ticks elapsed since the last fire, indexed by catalog position
  private readonly dueState: number[];
  private readonly inFlight = new Map<RpcMethodName, Promise<void>>();
  private isRunning = false;
  private isStopped = false;
  private ticks = 0;

  constructor(deps: SchedulerDeps) {
    if (!Number.isFinite(deps.intervalMs) || deps.intervalMs <= 0) {
      throw new Error(`Base interval must be positive, got ${deps.intervalMs}`);
    }
    this.catalog = deps.catalog;
    this.fetcher = deps.fetcher;
    this.publisher = deps.publisher;
    this.metrics = deps.metrics;
    this.shutdown = deps.shutdown;
    this.intervalMs = deps.intervalMs;
    this.dueState = new Array<number>(deps.catalog.size).fill(0);
  }

  get state(): SchedulerState {
    if (this.isStopped) return "stopped";
    if (this.shutdown.isTriggered) return "draining";
    return this.inFlight.size > 0 ? "dispatching" : "idle";
  }

  get tickCount(): number {
    return this.ticks;
  }

  /** Methods whose call has not resolved yet */
  get inFlightMethods(): RpcMethodName[] {
    return Array.from(this.inFlight.keys());
  }

  /**
   * Run until the shutdown signal is set and every in-flight call has resolved
   */
  async run(): Promise<void> {
    if (this.isRunning || this.isStopped) {
      throw new Error("Scheduler is already running or has stopped");
    }
    this.isRunning = true;

    const enabled = this.catalog.enabled();
    console.log(
      `[scheduler] Starting with base interval ${this.intervalMs / 1000}s, ${enabled.length} of ${this.catalog.size} methods enabled`,
    );
    for (const spec of enabled) {
      console.log(
        `  - ${spec.name} every ${spec.cadenceMultiplier} tick(s)`,
      );
    }

    let nextTickAt = Date.now() + this.intervalMs;
    while (!this.shutdown.isTriggered) {
      const elapsed = await this.shutdown.sleep(
        Math.max(0, nextTickAt - Date.now()),
      );
      if (!elapsed) break;

      this.tick();

      nextTickAt += this.intervalMs;
      const now = Date.now();
      if (nextTickAt <= now) {
        // The event loop stalled past a whole interval; drop the missed ticks
        const missed = Math.floor((now - nextTickAt) / this.intervalMs) + 1;
        console.warn(`[scheduler] Event loop lagged, skipping ${missed} tick(s)`);
        nextTickAt += missed * this.intervalMs;
      }
    }

    if (this.inFlight.size > 0) {
      console.log(
        `[scheduler] Shutdown requested, waiting for ${this.inFlight.size} in-flight call(s): ${this.inFlightMethods.join(", ")}`,
      );
    }
    await this.drain();

    this.isRunning = false;
    this.isStopped = true;
    console.log("[scheduler] Stopped");
  }

  /**
   * Advance every enabled method by one base tick and dispatch the due ones.
   * Returns the methods that were dispatched.
   */
  tick(): RpcMethodName[] {
    if (this.shutdown.isTriggered || this.isStopped) {
      return [];
    }
    this.ticks++;

    const dispatched: RpcMethodName[] = [];
    this.catalog.methods().forEach((spec, index) => {
      if (!spec.enabled) return;

      const elapsed = (this.dueState[index] ?? 0) + 1;
      if (elapsed < spec.cadenceMultiplier) {
        this.dueState[index] = elapsed;
        return;
      }

      if (this.inFlight.has(spec.name)) {
        // Stay due so the method fires as soon as it is free
        this.dueState[index] = spec.cadenceMultiplier;
        this.metrics.recordSkip(spec.name);
        console.warn(
          `[scheduler] ${spec.name} is due but its previous call is still running, skipping`,
        );
        return;
      }

      this.dueState[index] = 0;
      this.dispatch(spec);
      dispatched.push(spec.name);
    });

    return dispatched;
  }

  /**
   * Resolves once every call started so far has been recorded
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  private dispatch(spec: MethodSpec): void {
    const task = this.extract(spec).finally(() => {
      this.inFlight.delete(spec.name);
    });
    this.inFlight.set(spec.name, task);
  }

  /**
   * fetch -> record -> publish for one method. Never rejects.
   */
  private async extract(spec: MethodSpec): Promise<void> {
    try {
      const outcome = await this.fetcher.fetch(spec);
      this.metrics.recordDuration(spec.name, outcome.elapsedMs);

      if (!outcome.ok) {
        this.metrics.recordError(spec.name);
        console.warn(
          `[scheduler] ${spec.name} fetch failed (${outcome.kind}) after ${Math.round(outcome.elapsedMs)}ms: ${outcome.message}`,
        );
        return;
      }

      const result = await this.publisher.publish({
        method: spec.name,
        payload: outcome.payload,
        timestamp: new Date(),
      });
      if (!result.ok) {
        this.metrics.recordPublishError(spec.name);
        console.error(`[scheduler] ${result.error.message}`);
      }
    } catch (error) {
      console.error(
        `[scheduler] Unexpected error while extracting ${spec.name}: ${errorMessage(error)}`,
      );
    }
  }
}
