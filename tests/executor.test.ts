/**
 * LoadExecutor Tests
 *
 * Verifies:
 * - Steps run one at a time, in plan order, with the common JVM prefix
 * - The Nth failing step stops the run after exactly N invocations
 * - Each invocation finishes before the next one starts
 */

import { describe, it, expect } from "vitest";
import { LoadExecutor } from "../src/loader/executor.js";
import { buildLoadPlan, finalizePlan } from "../src/loader/plan.js";
import type { ImportStep, JavaRunner } from "../src/loader/types.js";
import { RecordingRunner, STUDY_DIR } from "./helpers/recording_runner.js";

const CONFIG = { jarPath: "/opt/importer/core.jar", springProfile: "dbcp" };

function planOf(count: number) {
  const steps: ImportStep[] = Array.from({ length: count }, (_, i): ImportStep => ({
    category: "SINGLE_OPERATION",
    entryPoint: `org.example.Step${i + 1}`,
    args: [`arg${i + 1}`],
  }));
  return finalizePlan({ mode: "full", studyId: "s" }, steps);
}

describe("LoadExecutor", () => {
  it("prefixes every invocation with profile and classpath", async () => {
    const runner = new RecordingRunner();
    const result = await new LoadExecutor(CONFIG, runner).execute(planOf(2));

    expect(result.status).toBe("success");
    expect(runner.calls).toEqual([
      ["-Dspring.profiles.active=dbcp", "-cp", "/opt/importer/core.jar", "org.example.Step1", "arg1"],
      ["-Dspring.profiles.active=dbcp", "-cp", "/opt/importer/core.jar", "org.example.Step2", "arg2"],
    ]);
    expect(result.stepResults.map((r) => r.status)).toEqual(["success", "success"]);
    expect(result.failedStep).toBeUndefined();
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("adds the properties location when configured", () => {
    const executor = new LoadExecutor(
      { ...CONFIG, propertiesFile: "/etc/portal/application.properties" },
      new RecordingRunner(),
    );
    expect(executor.commonArgs()).toEqual([
      "-Dspring.profiles.active=dbcp",
      "-Dspring.config.location=/etc/portal/application.properties",
      "-cp",
      "/opt/importer/core.jar",
    ]);
  });

  it.each([1, 3, 5])("stops after the failing step when step %i fails", async (n) => {
    const runner = new RecordingRunner(n, 2);
    const result = await new LoadExecutor(CONFIG, runner).execute(planOf(6));

    expect(runner.calls).toHaveLength(n);
    expect(result.status).toBe("failed");
    expect(result.stepResults).toHaveLength(n);
    expect(result.failedStep).toMatchObject({ status: "failed", index: n - 1, exitCode: 2 });
    expect(result.failedStep?.step.entryPoint).toBe(`org.example.Step${n}`);
  });

  it("waits for each step to finish before starting the next", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const runner: JavaRunner = {
      async run() {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return 0;
      },
    };

    await new LoadExecutor(CONFIG, runner).execute(planOf(4));

    expect(maxInFlight).toBe(1);
  });

  it("runs a full fixture plan and stops at the failing study import", async () => {
    const plan = buildLoadPlan({ directory: STUDY_DIR, mode: "full" });
    const runner = new RecordingRunner(4);

    const result = await new LoadExecutor(CONFIG, runner).execute(plan);

    expect(runner.calls).toHaveLength(4);
    expect(result.failedStep?.step.entryPoint).toBe("org.mskcc.cbio.portal.scripts.ImportCancerStudy");
  });

  it("logs one line per step and the failure", async () => {
    const info: string[] = [];
    const errors: string[] = [];
    const logger = {
      info: (step: string, msg: string) => info.push(`[${step}] ${msg}`),
      error: (step: string, msg: string) => errors.push(`[${step}] ${msg}`),
    };

    await new LoadExecutor(CONFIG, new RecordingRunner(2, 7), logger).execute(planOf(3));

    expect(info).toEqual(["[STEP] 1/3 Step1 arg1", "[STEP] 2/3 Step2 arg2"]);
    expect(errors).toEqual(["[STEP] 2/3 exited with code 7; aborting"]);
  });
});
