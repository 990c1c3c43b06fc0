/**
 * LoadExecutor: runs a LoadPlan against the importer, one step at a time.
 *
 * Every invocation gets the same JVM prefix (Spring profile, optional
 * properties location, classpath) before the step's entry point and args.
 * The first non-zero exit ends the run; steps already run are not undone.
 */

import { v4 as uuidv4 } from "uuid";

import { describeStep } from "./plan.js";
import { silentLogger } from "../shared/log.js";
import type { StepLogger } from "../shared/log.js";
import type {
  ExecutorConfig,
  ImportStep,
  JavaRunner,
  LoadPlan,
  LoadRunResult,
  StepResult,
} from "./types.js";

export class LoadExecutor {
  private config: ExecutorConfig;
  private runner: JavaRunner;
  private logger: StepLogger;

  constructor(config: ExecutorConfig, runner: JavaRunner, logger: StepLogger = silentLogger) {
    this.config = config;
    this.runner = runner;
    this.logger = logger;
  }

  /** Arguments shared by every invocation, ahead of the entry point. */
  commonArgs(): string[] {
    const args = [`-Dspring.profiles.active=${this.config.springProfile}`];
    if (this.config.propertiesFile) {
      args.push(`-Dspring.config.location=${this.config.propertiesFile}`);
    }
    args.push("-cp", this.config.jarPath);
    return args;
  }

  commandFor(step: ImportStep): string[] {
    return [...this.commonArgs(), step.entryPoint, ...step.args];
  }

  async execute(plan: LoadPlan): Promise<LoadRunResult> {
    const runId = uuidv4();
    const stepResults: StepResult[] = [];
    const t0 = Date.now();
    const total = plan.steps.length;

    for (let index = 0; index < total; index++) {
      const step = plan.steps[index];
      this.logger.info("STEP", `${index + 1}/${total} ${describeStep(step)}`);

      const started = Date.now();
      const exitCode = await this.runner.run(this.commandFor(step));
      const durationMs = Date.now() - started;

      if (exitCode !== 0) {
        const failed: StepResult = { status: "failed", step, index, durationMs, exitCode };
        stepResults.push(failed);
        this.logger.error("STEP", `${index + 1}/${total} exited with code ${exitCode}; aborting`);
        return {
          runId,
          status: "failed",
          stepResults,
          failedStep: failed,
          totalDurationMs: Date.now() - t0,
        };
      }

      stepResults.push({ status: "success", step, index, durationMs });
    }

    return {
      runId,
      status: "success",
      stepResults,
      totalDurationMs: Date.now() - t0,
    };
  }
}
