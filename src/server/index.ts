import {
  initConfig,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  type ExtractorConfig,
} from "../core/config/index.js";
import {
  BitcoinRpcClient,
  type RpcTransport,
} from "../core/components/BitcoinRpcClient.js";
import {
  NatsBusClient,
  type BusClient,
  type NatsConnectionConfig,
} from "../core/components/NatsBusClient.js";
import { MetricsRegistry, RpcMetrics } from "./metrics/index.js";
import {
  Fetcher,
  MethodCatalog,
  Publisher,
  Scheduler,
  ShutdownSignal,
} from "./extraction/index.js";

let logCounter = 0;

const initLog = (str: string) => {
  const counter = ++logCounter;
  console.log(`\n\n=====  [${counter}] ${str}`);
};

export interface ClosableBus extends BusClient {
  close(): Promise<void>;
}

/**
 * Replaceable connections; production uses NATS and the node's JSON-RPC
 */
export interface ExtractorDeps {
  connectBus?: (config: NatsConnectionConfig) => Promise<ClosableBus>;
  transport?: RpcTransport;
}

const createRpcClient = (config: ExtractorConfig): RpcTransport => {
  const rpcClient = new BitcoinRpcClient({
    host: config.RPC_HOST,
    ...(config.RPC_COOKIE_FILE ? { cookieFile: config.RPC_COOKIE_FILE } : {}),
    ...(config.RPC_USER ? { user: config.RPC_USER } : {}),
    ...(config.RPC_PASSWORD !== undefined
      ? { password: config.RPC_PASSWORD }
      : {}),
  });
  console.log(`RPC endpoint: ${rpcClient.getUrl()}`);
  return rpcClient;
};

/**
 * Run the extractor with an already validated config until `shutdown` is
 * triggered. Resolves after in-flight calls are recorded and published, then
 * the bus connection and the metrics server are closed, in that order.
 */
export const runExtractor = async (
  config: ExtractorConfig,
  shutdown: ShutdownSignal,
  deps: ExtractorDeps = {},
): Promise<void> => {
  const connectBus = deps.connectBus ?? NatsBusClient.connect;

  initLog("Initializing Prometheus metrics registry...");
  const registry = new MetricsRegistry({
    address: config.METRICS_ADDRESS,
    ...(config.METRICS_BEARER_TOKEN
      ? { bearerToken: config.METRICS_BEARER_TOKEN }
      : {}),
  });
  await registry.start();
  const metrics = new RpcMetrics(registry);

  let bus: ClosableBus | null = null;
  try {
    initLog("Connecting to NATS...");
    bus = await connectBus({
      address: config.NATS_ADDRESS,
      name: `${PACKAGE_NAME}@${PACKAGE_VERSION}`,
      ...(config.NATS_USERNAME ? { username: config.NATS_USERNAME } : {}),
      ...(config.NATS_PASSWORD !== undefined
        ? { password: config.NATS_PASSWORD }
        : {}),
      ...(config.NATS_PASSWORD_FILE
        ? { passwordFile: config.NATS_PASSWORD_FILE }
        : {}),
    });

    initLog("Building extraction pipeline...");
    const catalog = MethodCatalog.fromDisabled(config.DISABLED_METHODS);
    const transport = deps.transport ?? createRpcClient(config);

    const scheduler = new Scheduler({
      catalog,
      fetcher: new Fetcher(transport, { timeoutMs: config.RPC_TIMEOUT_MS }),
      publisher: new Publisher(bus, config.NATS_SUBJECT_PREFIX),
      metrics,
      shutdown,
      intervalMs: config.QUERY_INTERVAL_SECONDS * 1000,
    });

    initLog("Starting extraction...");
    await scheduler.run();
  } finally {
    console.log("\n\n=== Shutting down gracefully ===");
    try {
      if (bus) {
        await bus.close();
      }
      await registry.shutdown();
    } catch (err) {
      console.error("Error during shutdown:", err);
    }
  }
};

/**
 * Server mode: load config, serve metrics, extract until SIGINT/SIGTERM
 */
export const startServer = async (options?: { configFile?: string }) => {
  initLog("Loading configuration...");
  const config = await initConfig(
    options?.configFile ? { userConfigFilePath: options.configFile } : undefined,
  );

  const shutdown = new ShutdownSignal();
  const onSignal = (signal: NodeJS.Signals) => {
    if (shutdown.isTriggered) {
      console.log("Already shutting down, please wait...");
      return;
    }
    console.log(`\nReceived ${signal}`);
    shutdown.trigger(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await runExtractor(config, shutdown);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};
