#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { z } from "zod";
import { describeConfig, loadConfig, parseArgs } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./log.js";
import { createNotifiers, NotifierDispatcher } from "./notify/index.js";
import { runPipeline } from "./run.js";

const PackageSchema = z.object({ version: z.string() });

// dist/index.js and src/index.ts both sit one level below package.json
function packageVersion(): string {
  const text = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  return PackageSchema.parse(JSON.parse(text)).version;
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (parseArgs(argv).showVersion) {
    console.log(`read-loop ${packageVersion()}`);
    return 0;
  }

  const config = loadConfig(process.env, argv);
  const logger = createLogger({ level: config.logLevel });

  logger.info("read-loop starting");
  logger.info(`  Reads: ${config.run.readCount}`);
  logger.info(`  Pacing: ${config.run.minDelaySeconds}-${config.run.maxDelaySeconds}s`);
  logger.info(`  Retries per read: ${config.run.maxRetriesPerCall}`);
  logger.info(`  Channels: ${config.notify.channels.join(", ") || "none"}`);
  logger.debug("configuration", describeConfig(config));

  const dispatcher = new NotifierDispatcher(
    createNotifiers(config.notify.channels, {
      webhookUrl: config.notify.webhookUrl,
      timeoutMs: config.requestTimeoutMs,
      logger,
    }),
    { logger: logger.child("notify") }
  );

  if (config.testNotify) {
    const outcome = await dispatcher.test(config.notify.channels);
    return outcome.status === "Delivered" ? 0 : 1;
  }

  const { summary, exitCode } = await runPipeline({ config, dispatcher, logger });
  logger.info(
    `Summary: attempted=${summary.totalAttempted} succeeded=${summary.totalSucceeded} failed=${summary.totalFailed} duration=${summary.durationSeconds}s`
  );
  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`[read-loop] ${error.message}`);
    } else {
      console.error("[read-loop] Fatal error:", error);
    }
    process.exitCode = 1;
  });
