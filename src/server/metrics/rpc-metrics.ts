/**
 * RPC Metrics
 *
 * Per-method call duration and failure counters for the extraction loop
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import type { MetricsRegistry } from "./registry.js";

export const LABEL_RPC_METHOD = "rpc_method";

export const RPC_DURATION_BUCKETS = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0,
];

export interface MetricsRecorder {
  recordDuration(method: string, elapsedMs: number): void;
  recordError(method: string): void;
  recordPublishError(method: string): void;
  /** A due call was not started because the previous one is still running */
  recordSkip(method: string): void;
}

export class RpcMetrics implements MetricsRecorder {
  private readonly fetchDuration: Histogram;
  private readonly fetchErrors: Counter;
  private readonly publishErrors: Counter;
  private readonly fetchSkipped: Counter;

  constructor(registry: MetricsRegistry) {
    this.fetchDuration = registry.createHistogram(
      "rpc_fetch_duration_seconds",
      {
        description: "Time it took to fetch data from the RPC endpoint.",
        unit: "s",
        buckets: RPC_DURATION_BUCKETS,
      },
    );

    this.fetchErrors = registry.createCounter("rpc_fetch_errors_total", {
      description: "Number of errors while fetching data from the RPC endpoint.",
    });

    this.publishErrors = registry.createCounter("nats_publish_errors_total", {
      description: "Number of errors while publishing events to NATS.",
    });

    this.fetchSkipped = registry.createCounter("rpc_fetch_skipped_total", {
      description:
        "Number of due RPC fetches skipped because the previous call had not resolved.",
    });
  }

  recordDuration(method: string, elapsedMs: number): void {
    this.fetchDuration.record(elapsedMs / 1000, { [LABEL_RPC_METHOD]: method });
  }

  recordError(method: string): void {
    this.fetchErrors.add(1, { [LABEL_RPC_METHOD]: method });
  }

  recordPublishError(method: string): void {
    this.publishErrors.add(1, { [LABEL_RPC_METHOD]: method });
  }

  recordSkip(method: string): void {
    this.fetchSkipped.add(1, { [LABEL_RPC_METHOD]: method });
  }
}
