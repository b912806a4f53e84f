#!/usr/bin/env node

/**
 * CLI entry point for report-describer
 */

import { Command } from "commander";
import * as dotenv from "dotenv";
import * as readline from "readline/promises";
import {
  ReportDescriberOrchestrator,
  PersistentSessionProvider,
  generatorConfigFrom,
  loadConfig,
  loadReportRequests,
  validateConfig,
  type AppConfig,
  type ReportRequest,
} from "@report-describer/core";
import { createDescriptionGenerator } from "@report-describer/describer";
import { MCPBrowserClient } from "@report-describer/mcp";

// Load environment variables
dotenv.config();

type RunCommandOptions = {
  reauth?: boolean;
  config?: string;
  out?: string;
};

type PreparedRun = {
  orchestrator: ReportDescriberOrchestrator;
  requests: ReportRequest[];
};

const program = new Command();

program
  .name("report-describer")
  .description("Capture BI dashboard reports and describe them with a multimodal model")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Describe every report listed in a CSV file (columns: name, url, description)")
  .argument("<csv>", "Path to the input CSV file")
  .option("--reauth", "Discard the saved session and log in again before running")
  .option("--config <path>", "Path to config YAML file")
  .option("--out <dir>", "Output directory for descriptions and artifacts")
  .action(async (csvPath: string, options: RunCommandOptions) => {
    let prepared: PreparedRun;
    try {
      console.log("=== Report Describer ===\n");
      prepared = prepareRun(csvPath, options);
    } catch (error) {
      console.error(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }

    const controller = new AbortController();
    process.once("SIGINT", () => {
      console.warn("\nInterrupted; finishing up and marking remaining reports as cancelled...");
      controller.abort(new Error("interrupted by user"));
    });

    try {
      await prepared.orchestrator.run(prepared.requests, {
        forceReauth: options.reauth ?? false,
        signal: controller.signal,
      });
      process.exit(0);
    } catch (error) {
      console.error(`\n❌ Run halted: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file")
  .requiredOption("--config <path>", "Path to config YAML file")
  .action((options: { config: string }) => {
    try {
      const config = loadConfig(options.config);
      validateConfig(config);
      console.log("✓ Configuration is valid");
      console.log(JSON.stringify(redacted(config), null, 2));
      process.exit(0);
    } catch (error) {
      console.error(`❌ Invalid configuration: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

/**
 * Everything that can fail before the first report: config, input, collaborators
 */
function prepareRun(csvPath: string, options: RunCommandOptions): PreparedRun {
  const config = loadConfig(options.config);
  if (options.out) {
    config.run.outDir = options.out;
  }
  validateConfig(config);

  const requests = loadReportRequests(csvPath);
  if (requests.length === 0) {
    throw new Error(`No reports found in ${csvPath}`);
  }

  const orchestrator = new ReportDescriberOrchestrator(config, {
    sessionProvider: createSessionProvider(config),
    generator: createDescriptionGenerator(generatorConfigFrom(config)),
  });

  return { orchestrator, requests };
}

function createSessionProvider(config: AppConfig): PersistentSessionProvider {
  return new PersistentSessionProvider(config.target.baseUrl, config.session, {
    createBrowser: ({ headless, userDataDir }) =>
      new MCPBrowserClient({
        command: config.browser.command,
        args: config.browser.args,
        headless,
        userDataDir,
        viewport: config.browser.viewport,
      }),
    confirm: waitForEnter,
  });
}

async function waitForEnter(message: string): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    await rl.question(message);
  } finally {
    rl.close();
  }
}

function redacted(config: AppConfig): AppConfig {
  return config.model.apiKey ? { ...config, model: { ...config.model, apiKey: "***" } } : config;
}
