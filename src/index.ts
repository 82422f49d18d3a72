#!/usr/bin/env node
import { Command } from "commander";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { PACKAGE_VERSION } from "./core/config/index.js";
import { FatalConfigError } from "./core/errors.js";

/**
 * Check Node.js version meets minimum requirements
 */
const checkNodeVersion = () => {
  const minVersion = 20;
  const currentVersion = process.versions.node;
  const versionParts = currentVersion.split(".");
  const majorVersion = parseInt(versionParts[0] ?? "0");

  if (majorVersion < minVersion) {
    console.error(
      `❌ ERROR: Node.js version ${minVersion}.x or higher is required`,
    );
    console.error(`   Current version: ${currentVersion}`);
    console.error(`   Please upgrade Node.js to continue.`);
    process.exit(1);
  }
};

const program = new Command();

program
  .name("rpc-extractor")
  .description(
    "Queries Bitcoin Core RPC diagnostics, publishes them to NATS and exports Prometheus metrics",
  )
  .version(PACKAGE_VERSION);

program
  .command("serve")
  .description("Start the metrics server and the extraction loop")
  .option("-c, --config <file>", "Path to an env file with the configuration")
  .action(async (options: { config?: string }) => {
    checkNodeVersion();
    const { startServer } = await import("./server/index.js");
    await startServer(options.config ? { configFile: options.config } : undefined);
  });

// Resolve symlinks so the check also holds when started through the npm bin link
const invokedPath = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href
  : "";

if (import.meta.url === invokedPath) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof FatalConfigError) {
      console.error(`Fatal configuration error: ${error.message}`);
    } else {
      console.error("Fatal error:", error);
    }
    process.exit(1);
  });
}
