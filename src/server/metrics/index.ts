export {
  MetricsRegistry,
  METRICS_NAMESPACE,
  type MetricsRegistryOptions,
  type MetricOptions,
  type HistogramOptions,
} from "./registry.js";
export {
  RpcMetrics,
  LABEL_RPC_METHOD,
  RPC_DURATION_BUCKETS,
  type MetricsRecorder,
} from "./rpc-metrics.js";
