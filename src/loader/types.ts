/**
 * Study Loader Types
 *
 * Core type definitions for planning and running a study load. Planning
 * values (descriptors, steps, plans) are created fresh per invocation and
 * never outlive a single run.
 */

// ── File Kinds ─────────────────────────────────────────────────────

export type FileKind =
  | "CANCER_TYPE"
  | "STUDY"
  | "SAMPLE_ATTRIBUTES"
  | "PATIENT_ATTRIBUTES"
  | "RESOURCE_DEFINITION"
  | "RESOURCE_SAMPLE"
  | "RESOURCE_PATIENT"
  | "RESOURCE_STUDY"
  | "SEG"
  | "CNA_CONTINUOUS"
  | "CNA_DISCRETE"
  | "EXPRESSION"
  | "EXPRESSION_ZSCORE"
  | "METHYLATION"
  | "PROTEIN"
  | "MUTATION"
  | "STRUCTURAL_VARIANT"
  | "TREATMENT_RESPONSE"
  | "GSVA_SCORES"
  | "GSVA_PVALUES"
  | "GENERIC_ASSAY"
  | "MUTATIONAL_SIGNATURE"
  | "GISTIC_GENES"
  | "GENE_PANEL_MATRIX"
  | "SAMPLE_LIST";

/** Parsed `key: value` header of a meta file. */
export type MetaHeader = Record<string, string>;

export interface FileDescriptor {
  kind: FileKind;
  metaPath: string;
  dataPath?: string;
  studyId: string;
}

export interface ClassifiedDirectory {
  studyId: string;
  descriptors: FileDescriptor[];
  /** `case_lists/` directory, when the study ships one. */
  caseListDir?: string;
  /** Meta files whose header matched no known kind. */
  ignored: string[];
}

// ── Load Mode & Context ────────────────────────────────────────────

export type LoadMode = "full" | "incremental";

export interface PlanContext {
  mode: LoadMode;
  studyId: string;
}

// ── Steps & Plans ──────────────────────────────────────────────────

export type StepCategory =
  | "VERSION_CHECK"
  | "CANCER_TYPE"
  | "REMOVE_STUDY"
  | "STUDY"
  | "SAMPLE_ATTRIBUTES"
  | "RESOURCE_DEFINITION"
  | "RESOURCE_SAMPLE"
  | "PATIENT_ATTRIBUTES"
  | "SEG"
  | "CNA_CONTINUOUS"
  | "EXPRESSION"
  | "GENERIC_ASSAY"
  | "GISTIC_GENES"
  | "METHYLATION"
  | "MUTATIONAL_SIGNATURE"
  | "MUTATION"
  | "PROTEIN"
  | "RESOURCE_PATIENT"
  | "RESOURCE_STUDY"
  | "TREATMENT_RESPONSE"
  | "STRUCTURAL_VARIANT"
  | "CNA_DISCRETE"
  | "EXPRESSION_ZSCORE"
  | "GSVA_SCORES"
  | "GSVA_PVALUES"
  | "GENE_PANEL_MATRIX"
  | "SAMPLE_LIST"
  | "ADD_ALL_CASE_LIST"
  | "MARK_AVAILABLE"
  | "UPDATE_CASE_LISTS"
  | "SINGLE_OPERATION";

export interface ImportStep {
  category: StepCategory;
  /** Fully-qualified class name handed to the JVM. */
  entryPoint: string;
  args: string[];
  /** Meta or data file the step was derived from. */
  source?: string;
}

export interface SkippedFile {
  kind: FileKind;
  metaPath: string;
  reason: string;
}

export interface LoadPlan {
  mode: LoadMode;
  /** Absent for single operations that span several studies. */
  studyId?: string;
  steps: ImportStep[];
  skipped: SkippedFile[];
  /** Meta files whose header matched no known kind. */
  ignored: string[];
  /** SHA-256 of the canonical step list. */
  digest: string;
}

// ── Execution ──────────────────────────────────────────────────────

/** Runs one JVM invocation and resolves with its exit code. */
export interface JavaRunner {
  run(args: string[]): Promise<number>;
}

export interface ExecutorConfig {
  jarPath: string;
  springProfile: string;
  propertiesFile?: string;
}

export type StepResult =
  | { status: "success"; step: ImportStep; index: number; durationMs: number }
  | {
      status: "failed";
      step: ImportStep;
      index: number;
      durationMs: number;
      exitCode: number;
    };

export interface LoadRunResult {
  runId: string;
  status: "success" | "failed";
  stepResults: StepResult[];
  /** First failing step, when the run stopped early. */
  failedStep?: StepResult;
  totalDurationMs: number;
}
