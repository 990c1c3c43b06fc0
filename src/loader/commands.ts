/**
 * Single-operation commands: one importer call (plus the version check)
 * for repairing or patching a study without a full load.
 */

import { existsSync } from "fs";

import { detectFileKind, requiresDataFile } from "./classifier.js";
import {
  buildImportStep,
  removeSamplesStep,
  removeStudyStep,
  versionCheckStep,
} from "./catalog.js";
import { readMetaFile, resolveDataPath } from "./meta_file.js";
import { finalizePlan } from "./plan.js";
import { classificationError, configurationError } from "../shared/errors.js";
import type { FileDescriptor, ImportStep, LoadPlan } from "./types.js";

export type OperationCommand =
  | { command: "import-cancer-type"; dataFilename: string }
  | { command: "import-study"; metaFilename: string }
  | { command: "import-study-data"; metaFilename: string }
  | { command: "import-case-list"; metaFilename: string }
  | { command: "remove-study"; studyIds: string[] }
  | { command: "remove-samples"; studyIds: string[]; sampleIds: string[] };

export type OperationCommandName = OperationCommand["command"];

export const OPERATION_COMMANDS: readonly OperationCommandName[] = [
  "import-cancer-type",
  "import-study",
  "import-study-data",
  "import-case-list",
  "remove-study",
  "remove-samples",
];

function requireFile(filePath: string): void {
  if (!existsSync(filePath)) throw classificationError(`File not found: ${filePath}`);
}

/** Describe a single meta file outside of a directory scan. */
export function describeMetaFile(metaPath: string): FileDescriptor {
  requireFile(metaPath);
  const meta = readMetaFile(metaPath);
  const kind = detectFileKind(meta);
  if (kind === null) {
    throw classificationError(`${metaPath} is not a recognized meta file`);
  }
  const studyId = meta["cancer_study_identifier"] ?? "";
  const descriptor: FileDescriptor = { kind, metaPath, studyId };
  if (requiresDataFile(kind)) {
    const dataPath = resolveDataPath(metaPath, meta);
    if (!dataPath) throw classificationError(`${metaPath} does not declare a data_filename`);
    requireFile(dataPath);
    descriptor.dataPath = dataPath;
  }
  return descriptor;
}

function stepFor(descriptor: FileDescriptor): ImportStep {
  const step = buildImportStep(descriptor, { mode: "full", studyId: descriptor.studyId });
  if (!step) throw configurationError(`No import step for ${descriptor.metaPath}`);
  return step;
}

function nonEmpty(ids: string[], flag: string): string[] {
  if (ids.length === 0) throw configurationError(`${flag} has to name at least one id`);
  return ids;
}

export function buildCommandPlan(op: OperationCommand): LoadPlan {
  const steps: ImportStep[] = [versionCheckStep()];
  let studyId: string | undefined;

  switch (op.command) {
    case "import-cancer-type": {
      requireFile(op.dataFilename);
      steps.push(
        stepFor({
          kind: "CANCER_TYPE",
          metaPath: op.dataFilename,
          dataPath: op.dataFilename,
          studyId: "",
        }),
      );
      break;
    }
    case "import-study": {
      const descriptor = describeMetaFile(op.metaFilename);
      if (descriptor.kind !== "STUDY") {
        throw classificationError(`${op.metaFilename} is a ${descriptor.kind} meta file, not a study`);
      }
      studyId = descriptor.studyId;
      steps.push(stepFor(descriptor));
      break;
    }
    case "import-study-data": {
      const descriptor = describeMetaFile(op.metaFilename);
      if (descriptor.kind === "STUDY" || descriptor.kind === "CANCER_TYPE") {
        throw configurationError(
          `${op.metaFilename} is a ${descriptor.kind} meta file; use import-study or import-cancer-type`,
        );
      }
      if (!descriptor.studyId) {
        throw classificationError(`${op.metaFilename} does not declare cancer_study_identifier`);
      }
      studyId = descriptor.studyId;
      steps.push(stepFor(descriptor));
      break;
    }
    case "import-case-list": {
      requireFile(op.metaFilename);
      steps.push(
        stepFor({ kind: "SAMPLE_LIST", metaPath: op.metaFilename, studyId: "" }),
      );
      break;
    }
    case "remove-study": {
      for (const id of nonEmpty(op.studyIds, "--study_ids")) steps.push(removeStudyStep(id));
      break;
    }
    case "remove-samples": {
      steps.push(
        removeSamplesStep(nonEmpty(op.studyIds, "--study_ids"), nonEmpty(op.sampleIds, "--sample_ids")),
      );
      break;
    }
  }

  return finalizePlan({ mode: "full", studyId }, steps);
}
