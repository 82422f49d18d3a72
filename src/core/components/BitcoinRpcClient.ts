/**
 * BitcoinRpcClient - JSON-RPC over HTTP against a Bitcoin Core node
 */

import fs from "fs/promises";
import { z } from "zod";
import {
  RpcAuthError,
  RpcDecodeError,
  RpcNetworkError,
  RpcResponseError,
  errorMessage,
} from "../errors.js";

export interface RpcTransport {
  /**
   * Call a parameterless RPC method and return its `result`.
   * Rejects with an RpcCallError subclass.
   */
  call(method: string, options?: { signal?: AbortSignal }): Promise<unknown>;
}

export interface BitcoinRpcClientConfig {
  /** host:port of the node's RPC interface */
  host: string;
  /** Path to the node's .cookie file, preferred over user/password */
  cookieFile?: string;
  user?: string;
  password?: string;
}

const RpcResponseSchema = z.object({
  result: z.unknown(),
  error: z
    .object({ code: z.number(), message: z.string() })
    .passthrough()
    .nullish(),
  id: z.union([z.number(), z.string(), z.null()]),
});

interface Credentials {
  user: string;
  password: string;
}

export class BitcoinRpcClient implements RpcTransport {
  private readonly config: BitcoinRpcClientConfig;
  private nextId = 0;

  constructor(config: BitcoinRpcClientConfig) {
    this.config = config;
  }

  getUrl(): string {
    return `http://${this.config.host}/`;
  }

  async call(
    method: string,
    options?: { signal?: AbortSignal },
  ): Promise<unknown> {
    const credentials = await this.resolveCredentials(method);
    const id = ++this.nextId;

    let response: Response;
    try {
      response = await fetch(this.getUrl(), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Basic ${Buffer.from(
            `${credentials.user}:${credentials.password}`,
          ).toString("base64")}`,
        },
        body: JSON.stringify({ jsonrpc: "1.0", id, method, params: [] }),
        ...(options?.signal ? { signal: options.signal } : {}),
      });
    } catch (error) {
      // undici wraps the socket error in `cause`
      const cause =
        error instanceof Error && error.cause instanceof Error
          ? error.cause
          : error;
      throw new RpcNetworkError(
        method,
        `Could not reach ${this.config.host}: ${errorMessage(cause)}`,
        { cause: error },
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw new RpcAuthError(
        method,
        `Node rejected credentials (HTTP ${response.status})`,
        response.status,
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RpcNetworkError(
        method,
        `Connection dropped while reading response: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new RpcDecodeError(
        method,
        `HTTP ${response.status}: response body is not JSON`,
        { cause: error },
      );
    }

    const parsed = RpcResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RpcDecodeError(
        method,
        `HTTP ${response.status}: not a JSON-RPC response`,
        { cause: parsed.error },
      );
    }

    if (parsed.data.error) {
      throw new RpcResponseError(
        method,
        parsed.data.error.code,
        parsed.data.error.message,
      );
    }

    return parsed.data.result;
  }

  /**
   * The cookie is re-read on every call: the node rewrites it on restart
   */
  private async resolveCredentials(method: string): Promise<Credentials> {
    const { cookieFile, user, password } = this.config;
    if (cookieFile) {
      let content: string;
      try {
        content = await fs.readFile(cookieFile, "utf-8");
      } catch (error) {
        throw new RpcAuthError(
          method,
          `Could not read cookie file ${cookieFile}: ${errorMessage(error)}`,
          undefined,
          { cause: error },
        );
      }
      const trimmed = content.trim();
      const separator = trimmed.indexOf(":");
      if (separator <= 0) {
        throw new RpcAuthError(
          method,
          `Cookie file ${cookieFile} is not in <user>:<password> format`,
        );
      }
      return {
        user: trimmed.slice(0, separator),
        password: trimmed.slice(separator + 1),
      };
    }

    if (user && password !== undefined) {
      return { user, password };
    }

    throw new RpcAuthError(method, "No RPC credentials configured");
  }
}
