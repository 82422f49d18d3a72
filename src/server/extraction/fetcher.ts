/**
 * Fetcher - performs one RPC call and turns whatever happens into a FetchOutcome
 */

import type { RpcTransport } from "../../core/components/BitcoinRpcClient.js";
import {
  RpcCallError,
  RpcDecodeError,
  RpcTimeoutError,
  errorMessage,
  type RpcFailureKind,
} from "../../core/errors.js";
import type { MethodSpec } from "./method-catalog.js";
import type { RpcMethodName } from "../../types/rpc-methods.js";

export type FetchOutcome =
  | {
      ok: true;
      method: RpcMethodName;
      /** UTF-8 JSON text of the RPC result */
      payload: Uint8Array;
      elapsedMs: number;
    }
  | {
      ok: false;
      method: RpcMethodName;
      kind: RpcFailureKind;
      message: string;
      elapsedMs: number;
    };

export interface FetcherOptions {
  timeoutMs: number;
}

const encoder = new TextEncoder();

export class Fetcher {
  constructor(
    private readonly transport: RpcTransport,
    private readonly options: FetcherOptions,
  ) {}

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  /**
   * Never rejects
   */
  async fetch(spec: MethodSpec): Promise<FetchOutcome> {
    const startTime = performance.now();
    const elapsed = () => performance.now() - startTime;

    try {
      const result = await this.callWithTimeout(spec.name);

      const validated = spec.resultSchema.safeParse(result);
      if (!validated.success) {
        const issue = validated.error.issues[0];
        throw new RpcDecodeError(
          spec.name,
          `Unexpected result shape${issue ? ` at ${issue.path.join(".") || "<root>"}: ${issue.message}` : ""}`,
        );
      }

      return {
        ok: true,
        method: spec.name,
        payload: encoder.encode(JSON.stringify(result)),
        elapsedMs: elapsed(),
      };
    } catch (error) {
      return {
        ok: false,
        method: spec.name,
        kind: error instanceof RpcCallError ? error.kind : "network",
        message: errorMessage(error),
        elapsedMs: elapsed(),
      };
    }
  }

  private async callWithTimeout(method: RpcMethodName): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    // Settled before the abort so the race reports the timeout, not the aborted request
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new RpcTimeoutError(method, this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([
        this.transport.call(method, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
