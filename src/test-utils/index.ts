/**
 * In-process stand-ins for the node, the bus and the metrics recorder
 */

import { DataPointType } from "@opentelemetry/sdk-metrics";
import type { RpcTransport } from "../core/components/BitcoinRpcClient.js";
import type { BusClient } from "../core/components/NatsBusClient.js";
import type { MetricsRecorder } from "../server/metrics/rpc-metrics.js";
import { LABEL_RPC_METHOD } from "../server/metrics/rpc-metrics.js";
import type { MetricsRegistry } from "../server/metrics/registry.js";

export type Responder = (signal?: AbortSignal) => Promise<unknown>;

/**
 * Transport whose answers are set per method. Unknown methods reject.
 */
export class FakeTransport implements RpcTransport {
  readonly calls: string[] = [];
  private readonly responders = new Map<string, Responder>();

  on(method: string, responder: Responder): this {
    this.responders.set(method, responder);
    return this;
  }

  async call(
    method: string,
    options?: { signal?: AbortSignal },
  ): Promise<unknown> {
    this.calls.push(method);
    const responder = this.responders.get(method);
    if (!responder) {
      throw new Error(`No responder for ${method}`);
    }
    return responder(options?.signal);
  }

  callCount(method: string): number {
    return this.calls.filter((m) => m === method).length;
  }
}

/** Resolves with `value` after `ms` (real or fake timers) */
export const after =
  (ms: number, value: unknown): Responder =>
  () =>
    new Promise((resolve) => setTimeout(() => resolve(value), ms));

/** Rejects with `error` after `ms` */
export const failAfter =
  (ms: number, error: Error): Responder =>
  () =>
    new Promise((_, reject) => setTimeout(() => reject(error), ms));

/** Never settles */
export const hang = (): Responder => () => new Promise<never>(() => {});

export interface PublishedMessage {
  subject: string;
  payload: Uint8Array;
}

export class FakeBus implements BusClient {
  readonly messages: PublishedMessage[] = [];
  failWith: Error | null = null;

  async publish(subject: string, payload: Uint8Array): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.messages.push({ subject, payload });
  }

  onSubject(subject: string): PublishedMessage[] {
    return this.messages.filter((m) => m.subject === subject);
  }
}

type Counts = Map<string, number>;

const bump = (counts: Counts, method: string) =>
  counts.set(method, (counts.get(method) ?? 0) + 1);

export class RecordingMetrics implements MetricsRecorder {
  readonly durations = new Map<string, number[]>();
  readonly errors: Counts = new Map();
  readonly publishErrors: Counts = new Map();
  readonly skips: Counts = new Map();

  recordDuration(method: string, elapsedMs: number): void {
    const list = this.durations.get(method) ?? [];
    list.push(elapsedMs);
    this.durations.set(method, list);
  }

  recordError(method: string): void {
    bump(this.errors, method);
  }

  recordPublishError(method: string): void {
    bump(this.publishErrors, method);
  }

  recordSkip(method: string): void {
    bump(this.skips, method);
  }

  durationCount(method: string): number {
    return this.durations.get(method)?.length ?? 0;
  }

  errorCount(method: string): number {
    return this.errors.get(method) ?? 0;
  }
}

const findDataPoints = async (registry: MetricsRegistry, name: string) => {
  const { resourceMetrics } = await registry.collect();
  const metric = resourceMetrics.scopeMetrics
    .flatMap((scope) => scope.metrics)
    .find((m) => m.descriptor.name === name);
  return metric;
};

/**
 * Current value of a counter for one rpc_method, or undefined if never touched
 */
export const readCounter = async (
  registry: MetricsRegistry,
  name: string,
  method: string,
): Promise<number | undefined> => {
  const metric = await findDataPoints(registry, name);
  if (!metric || metric.dataPointType !== DataPointType.SUM) {
    return undefined;
  }
  const point = metric.dataPoints.find(
    (p) => p.attributes[LABEL_RPC_METHOD] === method,
  );
  return point?.value;
};

/**
 * Observation count and sum of a histogram for one rpc_method
 */
export const readHistogram = async (
  registry: MetricsRegistry,
  name: string,
  method: string,
): Promise<{ count: number; sum: number; boundaries: number[] } | undefined> => {
  const metric = await findDataPoints(registry, name);
  if (!metric || metric.dataPointType !== DataPointType.HISTOGRAM) {
    return undefined;
  }
  const point = metric.dataPoints.find(
    (p) => p.attributes[LABEL_RPC_METHOD] === method,
  );
  if (!point) {
    return undefined;
  }
  return {
    count: point.value.count,
    sum: point.value.sum ?? 0,
    boundaries: point.value.buckets.boundaries,
  };
};

/**
 * Await a promise that must reject with an instance of `type` and return that error
 */
export const rejectionOf = async <T extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => T,
): Promise<T> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected a rejection with ${type.name}`);
};

/**
 * Port of a server listening on TCP
 */
export const portOf = (server: { address(): unknown }): number => {
  const address = server.address();
  if (typeof address !== "object" || address === null || !("port" in address)) {
    throw new Error("Server is not listening on a TCP port");
  }
  const { port } = address;
  if (typeof port !== "number") {
    throw new Error("Server is not listening on a TCP port");
  }
  return port;
};
