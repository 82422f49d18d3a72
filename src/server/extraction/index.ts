export {
  MethodCatalog,
  CADENCE_MULTIPLIERS,
  RESULT_SCHEMAS,
  type MethodSpec,
} from "./method-catalog.js";
export { Fetcher, type FetchOutcome, type FetcherOptions } from "./fetcher.js";
export {
  Publisher,
  encodeEvent,
  subjectFor,
  type Event,
  type EventEnvelope,
  type PublishResult,
} from "./publisher.js";
export { ShutdownSignal } from "./shutdown-signal.js";
export {
  Scheduler,
  type SchedulerDeps,
  type SchedulerState,
  type MethodFetcher,
  type EventPublisher,
} from "./scheduler.js";
