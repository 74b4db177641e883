#!/usr/bin/env node

import path from "path";
import { Command, Option } from "commander";
import { assemblePdf } from "../core/assembler";
import { initConfig } from "../core/init-config";
import {
  fixedConflictStrategies,
  type ConflictMode,
  type ConflictStrategy,
} from "../core/output-path";
import { DEFAULT_CONFIG_FILE } from "../schema";
import { isLogLevel, Logger } from "../util/logger";
import { createPromptStrategy } from "./prompt";

type BaseCliOptions = {
  quiet?: boolean;
  debug?: boolean;
  onConflict?: ConflictMode;
};

type InitCliOptions = {
  force?: boolean;
};

const CONFLICT_MODES: ConflictMode[] = ["ask", "overwrite", "rename", "abort"];

/**
 * Create the root logger with the level from env and CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  const envLevel = process.env.PDF_ASSEMBLE_LOG_LEVEL;
  const logger = new Logger({
    level: isLogLevel(envLevel) ? envLevel : "info",
    prefix: "[pdf-assemble]",
  });

  if (opts.quiet) {
    logger.setLevel("silent");
  } else if (opts.debug) {
    logger.setLevel("debug");
  }
  return logger;
}

function conflictStrategyFor(mode: ConflictMode): ConflictStrategy {
  return mode === "ask" ? createPromptStrategy() : fixedConflictStrategies[mode];
}

async function handleRunCommand(
  cwd: string,
  configArg: string,
  outputArg: string,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const configPath = path.resolve(cwd, configArg);
  const outputPath = path.resolve(cwd, outputArg);

  logger.debug(
    `Starting (cwd=${cwd}, config=${configPath}, output=${outputPath}, on-conflict=${baseOpts.onConflict ?? "ask"})`,
  );

  const ok = await assemblePdf({
    configPath,
    outputPath,
    conflictStrategy: conflictStrategyFor(baseOpts.onConflict ?? "ask"),
    logger,
  });

  if (!ok) {
    logger.error("Processing failed");
    process.exitCode = 1;
  }
}

async function handleInitCommand(
  cwd: string,
  fileArg: string | undefined,
  initOpts: InitCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts).child("[init]");
  const { configPath, created } = initConfig(cwd, {
    fileName: fileArg,
    force: initOpts.force,
    logger,
  });

  if (created) {
    logger.info(`Edit ${configPath}, then run: pdf-assemble ${path.relative(cwd, configPath)} out.pdf`);
  }
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("pdf-assemble")
    .description("Merge PDFs and images into one PDF, driven by a JSON config")
    .argument("<config>", "Path to the configuration file (.json, .js or .ts)")
    .argument("<output>", "Path of the PDF to write")
    .addOption(
      new Option("--on-conflict <mode>", "What to do when the output file exists")
        .choices(CONFLICT_MODES)
        .default("ask"),
    )
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("init")
    .description(`Write a starter config (default: ./${DEFAULT_CONFIG_FILE})`)
    .argument("[file]", "Config file to create")
    .option("--force", "Overwrite the config file if it already exists")
    .action(async (fileArg: string | undefined, initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleInitCommand(cwd, fileArg, initOpts, baseOpts);
    });

  program.action(async (configArg: string, outputArg: string, opts: BaseCliOptions) => {
    await handleRunCommand(cwd, configArg, outputArg, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  createCliLogger({}).error(err);
  process.exit(1);
});
