/**
 * Publisher - wraps successful fetch results into events and puts them on the bus
 */

import type { BusClient } from "../../core/components/NatsBusClient.js";
import { PublishError, errorMessage } from "../../core/errors.js";
import type { RpcMethodName } from "../../types/rpc-methods.js";

export interface Event {
  method: RpcMethodName;
  /** Opaque to the publisher; carried base64 encoded in the envelope */
  payload: Uint8Array;
  timestamp: Date;
}

export interface EventEnvelope {
  method: string;
  timestamp: string;
  payload: string;
}

export type PublishResult =
  | { ok: true; subject: string }
  | { ok: false; subject: string; error: PublishError };

const encoder = new TextEncoder();

/**
 * One subject per method, lowercase, optionally below a dotted prefix
 */
export const subjectFor = (method: string, prefix?: string): string => {
  const name = method.toLowerCase();
  return prefix ? `${prefix}.${name}` : name;
};

export const encodeEvent = (event: Event): Uint8Array => {
  const envelope: EventEnvelope = {
    method: event.method,
    timestamp: event.timestamp.toISOString(),
    payload: Buffer.from(event.payload).toString("base64"),
  };
  return encoder.encode(JSON.stringify(envelope));
};

export class Publisher {
  constructor(
    private readonly bus: BusClient,
    private readonly subjectPrefix?: string,
  ) {}

  subjectFor(method: RpcMethodName): string {
    return subjectFor(method, this.subjectPrefix);
  }

  /**
   * At-most-once: no retry and no acknowledgement wait. Never rejects.
   */
  async publish(event: Event): Promise<PublishResult> {
    const subject = this.subjectFor(event.method);
    try {
      await this.bus.publish(subject, encodeEvent(event));
      return { ok: true, subject };
    } catch (error) {
      return {
        ok: false,
        subject,
        error: new PublishError(
          subject,
          `Failed to publish ${event.method} event on ${subject}: ${errorMessage(error)}`,
          { cause: error },
        ),
      };
    }
  }
}
