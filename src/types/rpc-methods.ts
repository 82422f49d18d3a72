// Catalog order; also the order of the DISABLE_* switches in the config
export const RPC_METHOD_NAMES = [
  "getpeerinfo",
  "getmempoolinfo",
  "uptime",
  "getnettotals",
  "getmemoryinfo",
  "getaddrmaninfo",
  "getchaintxstats",
  "getnetworkinfo",
  "getblockchaininfo",
] as const;

export type RpcMethodName = (typeof RPC_METHOD_NAMES)[number];

export const disableSwitchKey = (method: RpcMethodName) =>
  `DISABLE_${method.toUpperCase()}` as const;
