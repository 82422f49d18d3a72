import dotenv from "dotenv";
import envPath from "env-paths";
import fs from "fs/promises";
import path from "node:path";
import z from "zod";
import { FatalConfigError } from "../errors.js";
import {
  RPC_METHOD_NAMES,
  disableSwitchKey,
  type RpcMethodName,
} from "../../types/rpc-methods.js";

// Allow environment variable override for npm_package_version/name (useful when running via tsx)
const packageVersion =
  process.env.npm_package_version || process.env.NPM_PACKAGE_VERSION || "0.1.0";
const packageName =
  process.env.npm_package_name ||
  process.env.NPM_PACKAGE_NAME ||
  "rpc-extractor";

const SENSITIVE_CONFIG_KEYS = new Set([
  "RPC_PASSWORD",
  "NATS_PASSWORD",
  "METRICS_BEARER_TOKEN",
]);

export const PACKAGE_VERSION = packageVersion;
export const PACKAGE_NAME = packageName;

const HostPortSchema = z
  .string()
  .regex(/^[^\s:/]+:\d{1,5}$/, "expected <host>:<port>")
  .refine((value) => {
    const port = Number(value.slice(value.lastIndexOf(":") + 1));
    return port >= 1 && port <= 65535;
  }, "port must be between 1 and 65535");

const BooleanSwitchSchema = z
  .string()
  .transform((val) => val === "true" || val === "1")
  .pipe(z.boolean());

export const getDefaultConfigPath = (): string => {
  return path.join(
    envPath(PACKAGE_NAME, { suffix: "" }).config,
    `${PACKAGE_NAME}.env`,
  );
};

/**
 * Parse a single key, naming it in the error so a bad value is easy to find
 */
const readKey = <T extends z.ZodTypeAny>(
  key: string,
  schema: T,
  value: string | undefined,
): z.output<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new FatalConfigError(
      `Invalid configuration value for ${key}: ${issue?.message ?? "invalid"}`,
      { cause: result.error },
    );
  }
  return result.data;
};

/**
 * Build config object from environment variables
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  const disabledMethods: RpcMethodName[] = RPC_METHOD_NAMES.filter((method) =>
    readKey(
      disableSwitchKey(method),
      BooleanSwitchSchema,
      env[disableSwitchKey(method)] ?? "false",
    ),
  );

  const config = {
    RPC_HOST: readKey("RPC_HOST", HostPortSchema, env.RPC_HOST || "127.0.0.1:8332"),
    RPC_COOKIE_FILE: readKey(
      "RPC_COOKIE_FILE",
      z.string().min(1).optional(),
      env.RPC_COOKIE_FILE || undefined,
    ),
    RPC_USER: readKey(
      "RPC_USER",
      z.string().min(1).optional(),
      env.RPC_USER || undefined,
    ),
    RPC_PASSWORD: readKey(
      "RPC_PASSWORD",
      z.string().optional(),
      env.RPC_PASSWORD,
    ),
    RPC_TIMEOUT_MS: readKey(
      "RPC_TIMEOUT_MS",
      z.coerce.number().int().positive(),
      env.RPC_TIMEOUT_MS ?? "5000",
    ),
    QUERY_INTERVAL_SECONDS: readKey(
      "QUERY_INTERVAL_SECONDS",
      z.coerce.number().int().positive(),
      env.QUERY_INTERVAL_SECONDS ?? "10",
    ),
    METRICS_ADDRESS: readKey(
      "METRICS_ADDRESS",
      HostPortSchema,
      env.METRICS_ADDRESS || "127.0.0.1:8282",
    ),
    METRICS_BEARER_TOKEN: readKey(
      "METRICS_BEARER_TOKEN",
      z.string().min(1).optional(),
      env.METRICS_BEARER_TOKEN || undefined,
    ),
    NATS_ADDRESS: readKey(
      "NATS_ADDRESS",
      HostPortSchema,
      env.NATS_ADDRESS || "127.0.0.1:4222",
    ),
    NATS_USERNAME: readKey(
      "NATS_USERNAME",
      z.string().min(1).optional(),
      env.NATS_USERNAME || undefined,
    ),
    NATS_PASSWORD: readKey(
      "NATS_PASSWORD",
      z.string().optional(),
      env.NATS_PASSWORD,
    ),
    NATS_PASSWORD_FILE: readKey(
      "NATS_PASSWORD_FILE",
      z.string().min(1).optional(),
      env.NATS_PASSWORD_FILE || undefined,
    ),
    NATS_SUBJECT_PREFIX: readKey(
      "NATS_SUBJECT_PREFIX",
      z
        .string()
        .regex(/^[a-z0-9_-]+(\.[a-z0-9_-]+)*$/, "expected a lowercase dotted subject")
        .optional(),
      env.NATS_SUBJECT_PREFIX || undefined,
    ),
    DISABLED_METHODS: disabledMethods,
  };

  if (!config.RPC_COOKIE_FILE && !(config.RPC_USER && config.RPC_PASSWORD)) {
    throw new FatalConfigError(
      "No RPC credentials configured: set RPC_COOKIE_FILE, or RPC_USER and RPC_PASSWORD",
    );
  }

  return config;
}

export type ExtractorConfig = ReturnType<typeof buildConfig>;

/**
 * Render the configuration for the startup log, hiding secrets
 */
export const formatConfig = (config: ExtractorConfig): string =>
  Object.entries(config)
    .map(([key, value]) => {
      const shown = Array.isArray(value)
        ? value.join(",") || "none"
        : (value ?? "");
      return `  ${key}\t${SENSITIVE_CONFIG_KEYS.has(key) && value ? "[redacted]" : shown}`;
    })
    .join("\n");

/**
 * Load the env file (user supplied or default location) and build the config.
 * Values already present in the environment take precedence over the file.
 */
export const initConfig = async (options?: {
  suppressLog?: boolean;
  userConfigFilePath?: string;
}): Promise<ExtractorConfig> => {
  const configPath = options?.userConfigFilePath ?? getDefaultConfigPath();

  try {
    await fs.stat(configPath);
    dotenv.config({ path: configPath });
  } catch (e) {
    if (options?.userConfigFilePath) {
      throw new FatalConfigError(
        `Config file not found at provided path: ${configPath}`,
        { cause: e },
      );
    }
    if (!options?.suppressLog) {
      console.log(
        `No config file at ${configPath}, using environment variables only`,
      );
    }
  }

  const config = buildConfig();

  if (!options?.suppressLog) {
    console.log(`CONFIGURATION (reading from ${configPath}):
${formatConfig(config)}
`);
  }
  return config;
};
