import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { prepareNatsConnection } from "./NatsBusClient.js";
import { FatalConfigError } from "../errors.js";
import { rejectionOf } from "../../test-utils/index.js";

describe("prepareNatsConnection", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rpc-extractor-nats-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should connect without authentication when no username is set", async () => {
    await expect(
      prepareNatsConnection({ address: "127.0.0.1:4222", password: "ignored" }),
    ).resolves.toEqual({ servers: "127.0.0.1:4222" });
  });

  it("should pass the client name through", async () => {
    await expect(
      prepareNatsConnection({ address: "127.0.0.1:4222", name: "rpc-extractor" }),
    ).resolves.toEqual({ servers: "127.0.0.1:4222", name: "rpc-extractor" });
  });

  it("should use the configured password", async () => {
    await expect(
      prepareNatsConnection({
        address: "nats:4222",
        username: "extractor",
        password: "test-secret",
      }),
    ).resolves.toEqual({
      servers: "nats:4222",
      user: "extractor",
      pass: "test-secret",
    });
  });

  it("should read and trim the password file", async () => {
    const passwordFile = path.join(dir, "nats-password");
    await fs.writeFile(passwordFile, "test-secret\n");

    const options = await prepareNatsConnection({
      address: "nats:4222",
      username: "extractor",
      passwordFile,
    });

    expect(options.pass).toBe("test-secret");
  });

  it("should prefer the configured password over the file", async () => {
    const options = await prepareNatsConnection({
      address: "nats:4222",
      username: "extractor",
      password: "from-config",
      passwordFile: path.join(dir, "missing"),
    });

    expect(options.pass).toBe("from-config");
  });

  it("should fail when the password file cannot be read", async () => {
    const passwordFile = path.join(dir, "missing");

    const error = await rejectionOf(
      prepareNatsConnection({
        address: "nats:4222",
        username: "extractor",
        passwordFile,
      }),
      FatalConfigError,
    );

    expect(error.message).toMatch(
      new RegExp(`^Could not read NATS password file ${passwordFile}: `),
    );
  });

  it("should fail when a username has no password", async () => {
    const error = await rejectionOf(
      prepareNatsConnection({ address: "nats:4222", username: "extractor" }),
      FatalConfigError,
    );

    expect(error.message).toBe(
      "No NATS password supplied for user=extractor (set NATS_PASSWORD or NATS_PASSWORD_FILE)",
    );
  });
});
