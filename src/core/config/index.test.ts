import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { buildConfig, formatConfig, initConfig } from "./index.js";
import { FatalConfigError } from "../errors.js";
import { rejectionOf } from "../../test-utils/index.js";

const withPassword = { RPC_USER: "alice", RPC_PASSWORD: "test-secret" };

const fatalMessage = (fn: () => unknown): string => {
  try {
    fn();
  } catch (error) {
    if (error instanceof FatalConfigError) {
      return error.message;
    }
    throw error;
  }
  throw new Error("Expected a FatalConfigError");
};

describe("buildConfig", () => {
  it("should apply defaults", () => {
    const config = buildConfig(withPassword);

    expect(config).toEqual({
      RPC_HOST: "127.0.0.1:8332",
      RPC_COOKIE_FILE: undefined,
      RPC_USER: "alice",
      RPC_PASSWORD: "test-secret",
      RPC_TIMEOUT_MS: 5000,
      QUERY_INTERVAL_SECONDS: 10,
      METRICS_ADDRESS: "127.0.0.1:8282",
      METRICS_BEARER_TOKEN: undefined,
      NATS_ADDRESS: "127.0.0.1:4222",
      NATS_USERNAME: undefined,
      NATS_PASSWORD: undefined,
      NATS_PASSWORD_FILE: undefined,
      NATS_SUBJECT_PREFIX: undefined,
      DISABLED_METHODS: [],
    });
  });

  it("should accept a cookie file instead of a user and password", () => {
    const config = buildConfig({ RPC_COOKIE_FILE: "/var/lib/node/.cookie" });
    expect(config.RPC_COOKIE_FILE).toBe("/var/lib/node/.cookie");
  });

  it("should parse numeric settings", () => {
    const config = buildConfig({
      ...withPassword,
      QUERY_INTERVAL_SECONDS: "30",
      RPC_TIMEOUT_MS: "1500",
    });
    expect(config.QUERY_INTERVAL_SECONDS).toBe(30);
    expect(config.RPC_TIMEOUT_MS).toBe(1500);
  });

  it("should collect disabled methods in catalog order", () => {
    const config = buildConfig({
      ...withPassword,
      DISABLE_GETNETWORKINFO: "1",
      DISABLE_GETPEERINFO: "true",
      DISABLE_UPTIME: "false",
      DISABLE_GETMEMPOOLINFO: "yes",
    });
    expect(config.DISABLED_METHODS).toEqual(["getpeerinfo", "getnetworkinfo"]);
  });

  it("should reject missing RPC credentials", () => {
    expect(fatalMessage(() => buildConfig({ RPC_USER: "alice" }))).toBe(
      "No RPC credentials configured: set RPC_COOKIE_FILE, or RPC_USER and RPC_PASSWORD",
    );
  });

  it("should name the key of an invalid address", () => {
    expect(
      fatalMessage(() => buildConfig({ ...withPassword, RPC_HOST: "localhost" })),
    ).toBe("Invalid configuration value for RPC_HOST: expected <host>:<port>");
  });

  it.each(["127.0.0.1:99999", "127.0.0.1:0"])(
    "should reject the out-of-range port in %s",
    (address) => {
      expect(
        fatalMessage(() =>
          buildConfig({ ...withPassword, METRICS_ADDRESS: address }),
        ),
      ).toBe(
        "Invalid configuration value for METRICS_ADDRESS: port must be between 1 and 65535",
      );
    },
  );

  it("should accept the highest port", () => {
    const config = buildConfig({
      ...withPassword,
      NATS_ADDRESS: "nats.internal:65535",
    });
    expect(config.NATS_ADDRESS).toBe("nats.internal:65535");
  });

  it("should reject a zero interval", () => {
    expect(
      fatalMessage(() =>
        buildConfig({ ...withPassword, QUERY_INTERVAL_SECONDS: "0" }),
      ),
    ).toMatch(/^Invalid configuration value for QUERY_INTERVAL_SECONDS: /);
  });

  it("should reject an uppercase subject prefix", () => {
    expect(
      fatalMessage(() =>
        buildConfig({ ...withPassword, NATS_SUBJECT_PREFIX: "Bitcoin.RPC" }),
      ),
    ).toBe(
      "Invalid configuration value for NATS_SUBJECT_PREFIX: expected a lowercase dotted subject",
    );
  });
});

describe("formatConfig", () => {
  it("should hide secrets and list disabled methods", () => {
    const lines = formatConfig(
      buildConfig({
        ...withPassword,
        METRICS_BEARER_TOKEN: "test-token",
        DISABLE_UPTIME: "1",
      }),
    ).split("\n");

    expect(lines).toContain("  RPC_USER\talice");
    expect(lines).toContain("  RPC_PASSWORD\t[redacted]");
    expect(lines).toContain("  METRICS_BEARER_TOKEN\t[redacted]");
    expect(lines).toContain("  NATS_PASSWORD\t");
    expect(lines).toContain("  DISABLED_METHODS\tuptime");
  });

  it("should print none when nothing is disabled", () => {
    const lines = formatConfig(buildConfig(withPassword)).split("\n");
    expect(lines).toContain("  DISABLED_METHODS\tnone");
  });
});

describe("initConfig", () => {
  const FILE_KEYS = ["RPC_COOKIE_FILE", "QUERY_INTERVAL_SECONDS"] as const;
  let dir: string;
  let saved: Partial<Record<string, string>>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rpc-extractor-config-"));
    saved = {};
    for (const key of FILE_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const key of FILE_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should load settings from the given env file", async () => {
    const file = path.join(dir, "extractor.env");
    await fs.writeFile(
      file,
      "RPC_COOKIE_FILE=/tmp/test.cookie\nQUERY_INTERVAL_SECONDS=30\n",
    );

    const config = await initConfig({ suppressLog: true, userConfigFilePath: file });

    expect(config.RPC_COOKIE_FILE).toBe("/tmp/test.cookie");
    expect(config.QUERY_INTERVAL_SECONDS).toBe(30);
  });

  it("should fail when the given env file does not exist", async () => {
    const file = path.join(dir, "missing.env");

    const error = await rejectionOf(
      initConfig({ suppressLog: true, userConfigFilePath: file }),
      FatalConfigError,
    );

    expect(error.message).toBe(`Config file not found at provided path: ${file}`);
  });
});
