import { PrometheusExporter } from "@opentelemetry/exporter-prometheus";
import { MeterProvider, type CollectionResult } from "@opentelemetry/sdk-metrics";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { Counter, Histogram, Meter } from "@opentelemetry/api";
import http from "node:http";
import { PACKAGE_NAME } from "../../core/config/index.js";
import { FatalConfigError, errorMessage } from "../../core/errors.js";

export const METRICS_NAMESPACE = "rpcextractor";

const METRICS_PATHS = new Set(["/", "/metrics"]);

export interface MetricsRegistryOptions {
  /** host:port to serve the exposition on; omit to never start a server */
  address?: string;
  bearerToken?: string;
  namespace?: string;
}

export interface MetricOptions {
  description?: string;
  unit?: string;
}

export interface HistogramOptions extends MetricOptions {
  buckets?: number[];
}

/**
 * Owns the meter provider and Prometheus exporter for one extractor instance.
 * Built once at startup and handed to whatever records metrics.
 */
export class MetricsRegistry {
  readonly exporter: PrometheusExporter;
  readonly meterProvider: MeterProvider;
  private readonly meter: Meter;
  private readonly namespace: string;
  private server: http.Server | null = null;

  constructor(private readonly options: MetricsRegistryOptions = {}) {
    this.namespace = options.namespace ?? METRICS_NAMESPACE;

    // The exporter's own server cannot bind a host or check a token, so we serve it ourselves
    this.exporter = new PrometheusExporter({ preventServerStart: true });
    this.meterProvider = new MeterProvider({
      readers: [this.exporter],
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: PACKAGE_NAME,
      }),
    });
    this.meter = this.meterProvider.getMeter(PACKAGE_NAME);
  }

  createCounter(name: string, options?: MetricOptions): Counter {
    return this.meter.createCounter(`${this.namespace}_${name}`, options);
  }

  createHistogram(name: string, options?: HistogramOptions): Histogram {
    const { buckets, ...rest } = options ?? {};
    return this.meter.createHistogram(`${this.namespace}_${name}`, {
      ...rest,
      ...(buckets ? { advice: { explicitBucketBoundaries: buckets } } : {}),
    });
  }

  /**
   * Read the current state of every instrument
   */
  async collect(): Promise<CollectionResult> {
    return this.exporter.collect();
  }

  /**
   * Start serving the exposition. A failure to bind is fatal.
   */
  async start(): Promise<{ host: string; port: number }> {
    if (!this.options.address) {
      throw new FatalConfigError("No metrics address configured");
    }
    const separator = this.options.address.lastIndexOf(":");
    const host = this.options.address.slice(0, separator);
    const port = Number(this.options.address.slice(separator + 1));

    const server = http.createServer((req, res) => this.handleRequest(req, res));

    const bindError = (error: unknown) =>
      new FatalConfigError(
        `Could not bind metrics server to ${this.options.address}: ${errorMessage(error)}`,
        { cause: error },
      );

    await new Promise<void>((resolve, reject) => {
      server.once("error", (error) => reject(bindError(error)));
      // An out-of-range port throws synchronously instead of emitting "error"
      try {
        server.listen(port, host, () => resolve());
      } catch (error) {
        reject(bindError(error));
      }
    });

    server.on("error", (error) => {
      console.error("[metrics] HTTP server error:", error);
    });
    this.server = server;

    const bound = server.address();
    const boundPort = typeof bound === "object" && bound ? bound.port : port;
    console.log(
      `[metrics] Prometheus metrics available at http://${host}:${boundPort}/metrics`,
    );
    if (this.options.bearerToken) {
      console.log("[metrics]   Authentication: Bearer token required");
    }
    return { host, port: boundPort };
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    if (this.options.bearerToken) {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith("Bearer ")) {
        res.writeHead(401, {
          "Content-Type": "text/plain",
          "WWW-Authenticate": 'Bearer realm="Metrics"',
        });
        res.end("Unauthorized: Missing or invalid Bearer token");
        return;
      }

      const token = authHeader.substring(7); // Remove "Bearer " prefix

      if (token !== this.options.bearerToken) {
        res.writeHead(401, {
          "Content-Type": "text/plain",
          "WWW-Authenticate": 'Bearer realm="Metrics"',
        });
        res.end("Unauthorized: Invalid Bearer token");
        return;
      }
    }

    const path = (req.url ?? "/").split("?")[0] ?? "/";
    if (req.method === "GET" && METRICS_PATHS.has(path)) {
      this.exporter.getMetricsRequestHandler(req, res);
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
    }
  }

  async shutdown(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    // Race the provider shutdown with a 1 second timeout to prevent hanging
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        console.log("[metrics] Meter provider shutdown timed out, continuing");
        resolve();
      }, 1000);
    });
    await Promise.race([this.meterProvider.shutdown(), timeoutPromise]);
    clearTimeout(timer);
    console.log("[metrics] Prometheus exporter shut down");
  }
}
