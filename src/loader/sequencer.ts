/**
 * Dependency Sequencer: orders import steps by a fixed category rank.
 *
 * Study registration comes before clinical data, clinical data before
 * molecular profiles, profiles before case lists, and the study is marked
 * available last. Steps sharing a category are ordered by source path so
 * the plan never depends on directory enumeration order.
 */

import { configurationError } from "../shared/errors.js";
import type { ImportStep, LoadMode, StepCategory } from "./types.js";

export const FULL_LOAD_ORDER: readonly StepCategory[] = [
  "VERSION_CHECK",
  "CANCER_TYPE",
  "REMOVE_STUDY",
  "STUDY",
  "SAMPLE_ATTRIBUTES",
  "RESOURCE_DEFINITION",
  "RESOURCE_SAMPLE",
  "PATIENT_ATTRIBUTES",
  "SEG",
  // profile data
  "CNA_CONTINUOUS",
  "EXPRESSION",
  "GENERIC_ASSAY",
  "GISTIC_GENES",
  "METHYLATION",
  "MUTATIONAL_SIGNATURE",
  "MUTATION",
  "PROTEIN",
  "RESOURCE_PATIENT",
  "RESOURCE_STUDY",
  "TREATMENT_RESPONSE",
  // profiles that build on the ones above
  "STRUCTURAL_VARIANT",
  "CNA_DISCRETE",
  "EXPRESSION_ZSCORE",
  "GSVA_SCORES",
  "GSVA_PVALUES",
  "GENE_PANEL_MATRIX",
  "SAMPLE_LIST",
  "ADD_ALL_CASE_LIST",
  "MARK_AVAILABLE",
];

export const INCREMENTAL_LOAD_ORDER: readonly StepCategory[] = [
  "VERSION_CHECK",
  "PATIENT_ATTRIBUTES",
  "SAMPLE_ATTRIBUTES",
  "MUTATION",
  "UPDATE_CASE_LISTS",
];

function rankTable(order: readonly StepCategory[]): ReadonlyMap<StepCategory, number> {
  return new Map(order.map((category, index) => [category, index]));
}

export const STEP_RANKS: Record<LoadMode, ReadonlyMap<StepCategory, number>> = {
  full: rankTable(FULL_LOAD_ORDER),
  incremental: rankTable(INCREMENTAL_LOAD_ORDER),
};

export function getStepRank(category: StepCategory, mode: LoadMode): number {
  const rank = STEP_RANKS[mode].get(category);
  if (rank === undefined) {
    throw configurationError(`Step category ${category} has no place in ${mode} loads`);
  }
  return rank;
}

function compareSource(a: ImportStep, b: ImportStep): number {
  const left = a.source ?? "";
  const right = b.source ?? "";
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Return a new array of steps in execution order for the given mode.
 * The input is not modified.
 */
export function sequenceSteps(steps: ImportStep[], mode: LoadMode): ImportStep[] {
  const ranked = steps.map((step) => ({ step, rank: getStepRank(step.category, mode) }));
  ranked.sort((a, b) => a.rank - b.rank || compareSource(a.step, b.step));
  return ranked.map((r) => r.step);
}
