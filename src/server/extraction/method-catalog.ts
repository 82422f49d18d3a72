/**
 * MethodCatalog - the fixed table of RPC diagnostics the extractor queries
 */

import { z } from "zod";
import { FatalConfigError } from "../../core/errors.js";
import {
  RPC_METHOD_NAMES,
  type RpcMethodName,
} from "../../types/rpc-methods.js";

export interface MethodSpec {
  readonly name: RpcMethodName;
  readonly enabled: boolean;
  /** Number of base ticks between two calls of this method */
  readonly cadenceMultiplier: number;
  /** Shape the `result` field must have; anything else is a decode failure */
  readonly resultSchema: z.ZodTypeAny;
}

const countSchema = z.number().int().nonnegative();

// Only the fields downstream consumers rely on are checked, the rest passes through
export const RESULT_SCHEMAS: Record<RpcMethodName, z.ZodTypeAny> = {
  getpeerinfo: z.array(
    z.object({ id: countSchema, addr: z.string() }).passthrough(),
  ),
  getmempoolinfo: z
    .object({ loaded: z.boolean(), size: countSchema, bytes: countSchema })
    .passthrough(),
  uptime: countSchema,
  getnettotals: z
    .object({
      totalbytesrecv: countSchema,
      totalbytessent: countSchema,
      timemillis: countSchema,
    })
    .passthrough(),
  getmemoryinfo: z.object({ locked: z.object({}).passthrough() }).passthrough(),
  getaddrmaninfo: z.record(
    z.object({ new: countSchema, tried: countSchema, total: countSchema }),
  ),
  getchaintxstats: z
    .object({
      time: countSchema,
      // Absent on nodes started from an assumeutxo snapshot
      txcount: countSchema.optional(),
      window_final_block_height: countSchema,
      window_block_count: countSchema,
    })
    .passthrough(),
  getnetworkinfo: z
    .object({
      version: countSchema,
      subversion: z.string(),
      protocolversion: countSchema,
    })
    .passthrough(),
  getblockchaininfo: z
    .object({
      chain: z.string(),
      blocks: countSchema,
      headers: countSchema,
      bestblockhash: z.string(),
    })
    .passthrough(),
};

// getchaintxstats and getblockchaininfo walk chain state and are much more
// expensive on the node than the networking and memory diagnostics
export const CADENCE_MULTIPLIERS: Record<RpcMethodName, number> = {
  getpeerinfo: 1,
  getmempoolinfo: 1,
  uptime: 1,
  getnettotals: 1,
  getmemoryinfo: 1,
  getaddrmaninfo: 1,
  getchaintxstats: 10,
  getnetworkinfo: 1,
  getblockchaininfo: 10,
};

export class MethodCatalog {
  private readonly specs: readonly MethodSpec[];
  private readonly byName: ReadonlyMap<RpcMethodName, MethodSpec>;

  constructor(specs: readonly MethodSpec[]) {
    const seen = new Map<RpcMethodName, MethodSpec>();
    for (const spec of specs) {
      if (!Number.isInteger(spec.cadenceMultiplier) || spec.cadenceMultiplier < 1) {
        throw new FatalConfigError(
          `Cadence multiplier for ${spec.name} must be an integer >= 1, got ${spec.cadenceMultiplier}`,
        );
      }
      if (seen.has(spec.name)) {
        throw new FatalConfigError(`Duplicate catalog entry for ${spec.name}`);
      }
      seen.set(spec.name, Object.freeze({ ...spec }));
    }
    this.byName = seen;
    this.specs = Object.freeze(Array.from(seen.values()));
  }

  /**
   * Build the catalog of every supported method, disabling the given ones
   */
  static fromDisabled(disabled: readonly RpcMethodName[]): MethodCatalog {
    const disabledSet = new Set(disabled);
    return new MethodCatalog(
      RPC_METHOD_NAMES.map((name) => ({
        name,
        enabled: !disabledSet.has(name),
        cadenceMultiplier: CADENCE_MULTIPLIERS[name],
        resultSchema: RESULT_SCHEMAS[name],
      })),
    );
  }

  get size(): number {
    return this.specs.length;
  }

  /** All methods, in catalog order */
  methods(): readonly MethodSpec[] {
    return this.specs;
  }

  enabled(): MethodSpec[] {
    return this.specs.filter((spec) => spec.enabled);
  }

  get(name: RpcMethodName): MethodSpec | undefined {
    return this.byName.get(name);
  }
}
