/**
 * Load Planner: Classifier → Catalog → Sequencer.
 *
 * Reads the directory but writes nothing, so planning can be repeated on
 * an unchanged directory and yields the same plan and digest.
 */

import { classifyStudyDirectory } from "./classifier.js";
import {
  addAllCaseListStep,
  buildImportStep,
  markAvailableStep,
  removeStudyStep,
  updateCaseListsStep,
  versionCheckStep,
} from "./catalog.js";
import { sequenceSteps } from "./sequencer.js";
import { contentHash } from "../shared/hash.js";
import type {
  ClassifiedDirectory,
  ImportStep,
  LoadMode,
  LoadPlan,
  PlanContext,
  SkippedFile,
} from "./types.js";

export interface PlanRequest {
  directory: string;
  mode: LoadMode;
}

export function buildLoadPlan(request: PlanRequest): LoadPlan {
  const classified = classifyStudyDirectory(request.directory, request.mode);
  const context: PlanContext = { mode: request.mode, studyId: classified.studyId };
  return planFromClassified(classified, context);
}

export function planFromClassified(
  classified: ClassifiedDirectory,
  context: PlanContext,
): LoadPlan {
  const steps: ImportStep[] = [versionCheckStep()];
  const skipped: SkippedFile[] = [];

  for (const descriptor of classified.descriptors) {
    const step = buildImportStep(descriptor, context);
    if (step) {
      steps.push(step);
      continue;
    }
    // Case lists in a delta directory are applied by the case-list update.
    if (descriptor.kind !== "SAMPLE_LIST") {
      skipped.push({
        kind: descriptor.kind,
        metaPath: descriptor.metaPath,
        reason: `${descriptor.kind} is not applied by an ${context.mode} load`,
      });
    }
  }

  if (context.mode === "full") {
    steps.push(
      removeStudyStep(context.studyId),
      addAllCaseListStep(context.studyId),
      markAvailableStep(context.studyId),
    );
  } else {
    const sampleMeta = classified.descriptors.find((d) => d.kind === "SAMPLE_ATTRIBUTES");
    if (sampleMeta) {
      steps.push(updateCaseListsStep(sampleMeta.metaPath, classified.caseListDir));
    }
  }

  return finalizePlan(context, sequenceSteps(steps, context.mode), skipped, classified.ignored);
}

export function finalizePlan(
  context: { mode: LoadMode; studyId?: string },
  steps: ImportStep[],
  skipped: SkippedFile[] = [],
  ignored: string[] = [],
): LoadPlan {
  return {
    mode: context.mode,
    studyId: context.studyId,
    steps,
    skipped,
    ignored,
    digest: contentHash(steps),
  };
}

/** One line per step, e.g. `ImportCancerStudy /data/meta_study.txt --noprogress`. */
export function describeStep(step: ImportStep): string {
  const shortName = step.entryPoint.slice(step.entryPoint.lastIndexOf(".") + 1);
  return [shortName, ...step.args].join(" ");
}
