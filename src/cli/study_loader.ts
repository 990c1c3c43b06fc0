#!/usr/bin/env node
/**
 * CLI: study-loader
 *
 * Usage:
 *   study-loader --study_directory <dir>   full load of a study
 *   study-loader --data_directory <dir>    incremental load of a delta directory
 *   study-loader --command <cmd> [...]     single operation (see USAGE)
 *
 * Plans the importer calls for the directory, then runs them one by one
 * through the importer jar. Exits 1 on the first failing step.
 */

import "dotenv/config";
import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { buildCommandPlan, OPERATION_COMMANDS } from "../loader/commands.js";
import type { OperationCommand, OperationCommandName } from "../loader/commands.js";
import { LoadExecutor } from "../loader/executor.js";
import { SpawnJavaRunner } from "../loader/java_runner.js";
import { locateJar } from "../loader/jar.js";
import { selectLoadMode } from "../loader/load_mode.js";
import { buildLoadPlan, describeStep } from "../loader/plan.js";
import { loadEnvConfig } from "../shared/env_config.js";
import { configurationError, StudyLoaderError } from "../shared/errors.js";
import { createStepLogger } from "../shared/log.js";
import type { LogSink } from "../shared/log.js";
import type { JavaRunner, LoadPlan } from "../loader/types.js";

export const USAGE = [
  "Usage: study-loader (--study_directory <dir> | --data_directory <dir>)",
  "                    [--jar_path <jar>] [--properties_filename <file>] [--profile <name>] [--dry-run]",
  "       study-loader --command <cmd> [--meta_filename <file>] [--data_filename <file>]",
  "                    [--study_ids <a,b>] [--sample_ids <a,b>] [--jar_path <jar>] [--dry-run]",
  `Commands: ${OPERATION_COMMANDS.join(", ")}`,
].join("\n");

export interface LoaderArgs {
  studyDirectory?: string;
  dataDirectory?: string;
  jarPath?: string;
  propertiesFilename?: string;
  profile?: string;
  command?: string;
  metaFilename?: string;
  dataFilename?: string;
  studyIds: string[];
  sampleIds: string[];
  dryRun: boolean;
  help: boolean;
}

const VALUE_FLAGS: Record<string, keyof LoaderArgs> = {
  "--study_directory": "studyDirectory",
  "-s": "studyDirectory",
  "--data_directory": "dataDirectory",
  "-d": "dataDirectory",
  "--jar_path": "jarPath",
  "--properties_filename": "propertiesFilename",
  "-p": "propertiesFilename",
  "--profile": "profile",
  "--command": "command",
  "-c": "command",
  "--meta_filename": "metaFilename",
  "-m": "metaFilename",
  "--data_filename": "dataFilename",
  "--study_ids": "studyIds",
  "--sample_ids": "sampleIds",
};

function usageError(message: string): StudyLoaderError {
  return new StudyLoaderError("usage", `${message}\n${USAGE}`);
}

function splitIds(value: string): string[] {
  return value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id !== "");
}

export function parseLoaderArgs(argv: string[]): LoaderArgs {
  const args: LoaderArgs = { studyIds: [], sampleIds: [], dryRun: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--dry-run") {
      args.dryRun = true;
      continue;
    }
    if (flag === "--help" || flag === "-h") {
      args.help = true;
      continue;
    }

    const field = VALUE_FLAGS[flag];
    if (!field) throw usageError(`Unknown argument: ${flag}`);
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("-")) {
      throw usageError(`${flag} needs a value`);
    }
    i++;

    if (field === "studyIds" || field === "sampleIds") {
      args[field] = splitIds(value);
    } else if (field !== "dryRun" && field !== "help") {
      args[field] = value;
    }
  }

  return args;
}

function isCommandName(name: string): name is OperationCommandName {
  return OPERATION_COMMANDS.some((command) => command === name);
}

function requireOption(value: string | undefined, flag: string, command: string): string {
  if (!value) throw usageError(`${command} requires ${flag}`);
  return value;
}

export function toOperationCommand(args: LoaderArgs): OperationCommand {
  const name = args.command ?? "";
  if (!isCommandName(name)) throw usageError(`Unknown command: ${name}`);
  if (args.studyDirectory || args.dataDirectory) {
    throw usageError("--command cannot be combined with a directory argument");
  }

  switch (name) {
    case "import-cancer-type":
      return {
        command: name,
        dataFilename: requireOption(args.dataFilename, "--data_filename", name),
      };
    case "import-study":
    case "import-study-data":
    case "import-case-list":
      return {
        command: name,
        metaFilename: requireOption(args.metaFilename, "--meta_filename", name),
      };
    case "remove-study":
      return { command: name, studyIds: args.studyIds };
    case "remove-samples":
      return { command: name, studyIds: args.studyIds, sampleIds: args.sampleIds };
  }
}

function planFor(args: LoaderArgs): LoadPlan {
  if (args.command !== undefined) return buildCommandPlan(toOperationCommand(args));
  return buildLoadPlan(selectLoadMode(args));
}

export interface LoaderDeps {
  env?: NodeJS.ProcessEnv;
  /** Replaces the spawned JVM, e.g. with an in-process fake. */
  runner?: JavaRunner;
  sink?: LogSink;
}

/**
 * Run the loader for one command line. Resolves with the process exit code.
 */
export async function runStudyLoader(argv: string[], deps: LoaderDeps = {}): Promise<number> {
  const logger = createStepLogger(deps.sink);

  try {
    const args = parseLoaderArgs(argv);
    if (args.help) {
      (deps.sink?.out ?? console.log)(USAGE);
      return 0;
    }

    const plan = planFor(args);
    logger.info("PLAN", `Mode: ${plan.mode}${plan.studyId ? ` | Study: ${plan.studyId}` : ""}`);
    logger.info("PLAN", `${plan.steps.length} steps | digest ${plan.digest.slice(0, 12)}`);
    for (const ignored of plan.ignored) {
      logger.info("PLAN", `Ignored unrecognized meta file: ${ignored}`);
    }
    for (const skipped of plan.skipped) {
      logger.info("PLAN", `Skipped ${skipped.metaPath}: ${skipped.reason}`);
    }

    if (args.dryRun) {
      plan.steps.forEach((step, i) => logger.info("DRY-RUN", `${i + 1}. ${describeStep(step)}`));
      return 0;
    }

    const env = loadEnvConfig(deps.env);
    const jarPath = locateJar({ jarPath: args.jarPath, env });
    logger.info("JAR", jarPath);

    let propertiesFile: string | undefined;
    if (args.propertiesFilename) {
      propertiesFile = path.resolve(args.propertiesFilename);
      if (!existsSync(propertiesFile)) {
        throw configurationError(`Properties file not found: ${propertiesFile}`);
      }
    }

    const executor = new LoadExecutor(
      { jarPath, springProfile: args.profile ?? env.SPRING_PROFILE, propertiesFile },
      deps.runner ?? new SpawnJavaRunner(env.JAVA_BIN),
      logger,
    );
    const result = await executor.execute(plan);

    if (result.status === "failed" && result.failedStep) {
      const failed = result.failedStep;
      logger.error(
        "RESULT",
        `✗ Step ${failed.index + 1}/${plan.steps.length} failed: ${describeStep(failed.step)}`,
      );
      return 1;
    }

    const seconds = (result.totalDurationMs / 1000).toFixed(1);
    logger.info("RESULT", `✓ ${result.stepResults.length} steps completed in ${seconds}s (run ${result.runId})`);
    return 0;
  } catch (err) {
    if (err instanceof StudyLoaderError) {
      logger.error("ERROR", `${err.kind}: ${err.message}`);
      return 1;
    }
    const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
    logger.error("ERROR", message);
    return 1;
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  runStudyLoader(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
