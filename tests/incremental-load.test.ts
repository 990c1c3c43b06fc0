/**
 * Incremental Load
 *
 * Covers: the literal call sequence for a delta directory, overwrite flags,
 * omission of absent files, and files an incremental load does not apply.
 */

import { describe, it, expect, afterEach } from "vitest";
import { cpSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { runStudyLoader } from "../src/cli/study_loader.js";
import { buildLoadPlan } from "../src/loader/plan.js";
import type { ImportStep } from "../src/loader/types.js";
import {
  INCREMENTAL_DIR,
  RecordingRunner,
  TEST_JAR,
  captureSink,
} from "./helpers/recording_runner.js";

const common = ["-Dspring.profiles.active=dbcp", "-cp", TEST_JAR];
const scripts = "org.mskcc.cbio.portal.scripts";

const tempDirs: string[] = [];

function copyDeltaDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "study-loader-inc-"));
  tempDirs.push(dir);
  cpSync(INCREMENTAL_DIR, dir, { recursive: true });
  return dir;
}

function stepNames(steps: ImportStep[]): string[] {
  return steps.map((s) => `${s.category}:${s.source ? path.basename(s.source) : "-"}`);
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("Incremental load", () => {
  it("issues the overwrite imports and the case list update in order", async () => {
    const runner = new RecordingRunner();
    const d = (name: string) => path.join(INCREMENTAL_DIR, name);

    const code = await runStudyLoader(
      ["--data_directory", INCREMENTAL_DIR, "--jar_path", TEST_JAR],
      { env: {}, runner, sink: captureSink() },
    );

    expect(code).toBe(0);
    expect(runner.calls).toEqual([
      [...common, "org.mskcc.cbio.portal.util.VersionUtil"],
      [
        ...common,
        `${scripts}.ImportClinicalData`,
        "--overwrite-existing",
        "--meta", d("meta_clinical_patients.txt"),
        "--loadMode", "bulkload",
        "--data", d("data_clinical_patients.txt"),
        "--noprogress",
      ],
      [
        ...common,
        `${scripts}.ImportClinicalData`,
        "--overwrite-existing",
        "--meta", d("meta_clinical_samples.txt"),
        "--loadMode", "bulkload",
        "--data", d("data_clinical_samples.txt"),
        "--noprogress",
      ],
      [
        ...common,
        `${scripts}.ImportProfileData`,
        "--overwrite-existing",
        "--meta", d("meta_mutations_extended.txt"),
        "--loadMode", "bulkload",
        "--update-info", "False",
        "--data", d("data_mutations_extended.maf"),
        "--noprogress",
      ],
      [
        ...common,
        `${scripts}.UpdateCaseListsSampleIds`,
        "--meta", d("meta_clinical_samples.txt"),
        "--case-lists", d("case_lists"),
      ],
    ]);
  });

  it("has no finalize step and resolves the study id from the meta files", () => {
    const plan = buildLoadPlan({ directory: INCREMENTAL_DIR, mode: "incremental" });
    expect(plan.studyId).toBe("study_es_0");
    expect(plan.steps.map((s) => s.category)).not.toContain("MARK_AVAILABLE");
    expect(plan.steps.map((s) => s.category)).not.toContain("REMOVE_STUDY");
  });

  it("passes --overwrite-existing to every data step", () => {
    const plan = buildLoadPlan({ directory: INCREMENTAL_DIR, mode: "incremental" });
    const dataSteps = plan.steps.filter(
      (s) => s.category !== "VERSION_CHECK" && s.category !== "UPDATE_CASE_LISTS",
    );
    expect(dataSteps).toHaveLength(3);
    for (const step of dataSteps) {
      expect(step.args[0]).toBe("--overwrite-existing");
    }
  });

  it("drops only the step of a removed patient file", () => {
    const dir = copyDeltaDir();
    const before = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);
    rmSync(path.join(dir, "meta_clinical_patients.txt"));

    const after = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);

    expect(after).toEqual(before.filter((s) => s !== "PATIENT_ATTRIBUTES:meta_clinical_patients.txt"));
    expect(after).toHaveLength(4);
  });

  it("drops only the step of a removed mutation file", () => {
    const dir = copyDeltaDir();
    const before = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);
    rmSync(path.join(dir, "meta_mutations_extended.txt"));

    const after = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);

    expect(after).toEqual(before.filter((s) => s !== "MUTATION:meta_mutations_extended.txt"));
  });

  it("drops the sample import and the case list update with the sample file", () => {
    const dir = copyDeltaDir();
    const before = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);
    rmSync(path.join(dir, "meta_clinical_samples.txt"));

    const after = stepNames(buildLoadPlan({ directory: dir, mode: "incremental" }).steps);

    expect(after).toEqual(
      before.filter(
        (s) =>
          s !== "SAMPLE_ATTRIBUTES:meta_clinical_samples.txt" &&
          s !== "UPDATE_CASE_LISTS:meta_clinical_samples.txt",
      ),
    );
    expect(after).toEqual([
      "VERSION_CHECK:-",
      "PATIENT_ATTRIBUTES:meta_clinical_patients.txt",
      "MUTATION:meta_mutations_extended.txt",
    ]);
  });

  it("plans only the version check for a delta holding only case lists", () => {
    const dir = copyDeltaDir();
    for (const name of [
      "meta_clinical_patients.txt",
      "meta_clinical_samples.txt",
      "meta_mutations_extended.txt",
    ]) {
      rmSync(path.join(dir, name));
    }

    const plan = buildLoadPlan({ directory: dir, mode: "incremental" });

    expect(plan.studyId).toBe("study_es_0");
    expect(stepNames(plan.steps)).toEqual(["VERSION_CHECK:-"]);
    expect(plan.skipped).toEqual([]);
  });

  it("omits --case-lists when the delta has no case_lists directory", () => {
    const dir = copyDeltaDir();
    rmSync(path.join(dir, "case_lists"), { recursive: true, force: true });

    const plan = buildLoadPlan({ directory: dir, mode: "incremental" });
    const update = plan.steps[plan.steps.length - 1];

    expect(update.category).toBe("UPDATE_CASE_LISTS");
    expect(update.args).toEqual(["--meta", path.join(dir, "meta_clinical_samples.txt")]);
  });

  it("reports files an incremental load does not apply instead of running them", () => {
    const dir = copyDeltaDir();
    writeFileSync(
      path.join(dir, "meta_methylation.txt"),
      [
        "cancer_study_identifier: study_es_0",
        "genetic_alteration_type: METHYLATION",
        "datatype: CONTINUOUS",
        "data_filename: data_methylation.txt",
      ].join("\n"),
    );
    writeFileSync(path.join(dir, "data_methylation.txt"), "placeholder\n");

    const plan = buildLoadPlan({ directory: dir, mode: "incremental" });

    expect(plan.steps).toHaveLength(5);
    expect(plan.skipped).toEqual([
      {
        kind: "METHYLATION",
        metaPath: path.join(dir, "meta_methylation.txt"),
        reason: "METHYLATION is not applied by an incremental load",
      },
    ]);
  });
});
