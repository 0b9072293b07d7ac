#!/usr/bin/env node
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  type ServerConfig,
  prefixedLogger,
} from "@hearth/engine";
import {
  type CliArgs,
  CliUsageError,
  HELP_TEXT,
  parseArgs,
  toStorageRoot,
} from "./args.js";

async function readVersion(): Promise<string> {
  // src/ and dist/ both sit one level below package.json
  const manifest = fileURLToPath(new URL("../package.json", import.meta.url));
  const parsed: unknown = JSON.parse(await fs.readFile(manifest, "utf8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "unknown";
}

function readArgs(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = readArgs();
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(await readVersion());
    return;
  }

  const directory = path.resolve(args.directory);
  const stat = await fs.stat(directory).catch(() => null);
  if (!stat?.isDirectory()) {
    console.error(`Not a directory: ${directory}`);
    process.exit(1);
  }

  const logger = prefixedLogger("hearth", basicLogger());

  const defaults = defaultConfig(toStorageRoot(directory, path.sep));
  const config: ServerConfig = {
    ...defaults,
    port: args.port,
    host: args.host,
    quiet: args.quiet,
    logLevel: args.logLevel,
    maxRequestSize: args.maxRequestSize ?? defaults.maxRequestSize,
    restrictToRoot: args.restrictToRoot,
  };

  const server = createNodeServer({ config, logger });
  server.on("error", (err) => {
    logger.error("Server error:", err);
  });

  const port = await server.start();

  console.log(`\n  hearth storing files in ${config.storageRoot}\n`);
  console.log(`  Local:   http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`);
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
