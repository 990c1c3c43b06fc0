/**
 * Step Catalog: maps each file kind to the importer class and argument
 * vector that loads it.
 *
 * The argument order is the importer's command-line contract and must not
 * be rearranged. `--update-info` takes the literal string "False".
 */

import { configurationError } from "../shared/errors.js";
import type { FileDescriptor, FileKind, ImportStep, PlanContext, StepCategory } from "./types.js";

const SCRIPTS_PACKAGE = "org.mskcc.cbio.portal.scripts";

export const ENTRY_POINTS = {
  versionUtil: "org.mskcc.cbio.portal.util.VersionUtil",
  importTypesOfCancers: `${SCRIPTS_PACKAGE}.ImportTypesOfCancers`,
  removeCancerStudy: `${SCRIPTS_PACKAGE}.RemoveCancerStudy`,
  importCancerStudy: `${SCRIPTS_PACKAGE}.ImportCancerStudy`,
  importClinicalData: `${SCRIPTS_PACKAGE}.ImportClinicalData`,
  importResourceDefinition: `${SCRIPTS_PACKAGE}.ImportResourceDefinition`,
  importResourceData: `${SCRIPTS_PACKAGE}.ImportResourceData`,
  importCopyNumberSegmentData: `${SCRIPTS_PACKAGE}.ImportCopyNumberSegmentData`,
  importProfileData: `${SCRIPTS_PACKAGE}.ImportProfileData`,
  importGisticData: `${SCRIPTS_PACKAGE}.ImportGisticData`,
  importGenePanelProfileMap: `${SCRIPTS_PACKAGE}.ImportGenePanelProfileMap`,
  importSampleList: `${SCRIPTS_PACKAGE}.ImportSampleList`,
  addCaseList: `${SCRIPTS_PACKAGE}.AddCaseList`,
  updateCancerStudy: `${SCRIPTS_PACKAGE}.UpdateCancerStudy`,
  updateCaseListsSampleIds: `${SCRIPTS_PACKAGE}.UpdateCaseListsSampleIds`,
  removeSamples: `${SCRIPTS_PACKAGE}.RemoveSamples`,
} as const;

const NO_PROGRESS = "--noprogress";
const OVERWRITE_EXISTING = "--overwrite-existing";

/** Kinds that an incremental load is able to apply. */
export const INCREMENTAL_KINDS: ReadonlySet<FileKind> = new Set<FileKind>([
  "PATIENT_ATTRIBUTES",
  "SAMPLE_ATTRIBUTES",
  "MUTATION",
]);

type StepBuilder = (
  descriptor: FileDescriptor,
  context: PlanContext,
) => Omit<ImportStep, "category">;

interface CatalogEntry {
  category: StepCategory;
  build: StepBuilder;
}

function requireDataPath(descriptor: FileDescriptor): string {
  if (!descriptor.dataPath) {
    throw configurationError(`${descriptor.kind} step needs a data file: ${descriptor.metaPath}`);
  }
  return descriptor.dataPath;
}

interface DataImportOptions {
  updateInfo: boolean;
  overwritable: boolean;
}

/** `[--overwrite-existing] --meta M --loadMode bulkload [--update-info False] --data D --noprogress` */
function dataImport(
  category: StepCategory,
  entryPoint: string,
  options: DataImportOptions,
): CatalogEntry {
  return {
    category,
    build: (descriptor, context) => {
      const args: string[] = [];
      if (options.overwritable && context.mode === "incremental") {
        args.push(OVERWRITE_EXISTING);
      }
      args.push("--meta", descriptor.metaPath, "--loadMode", "bulkload");
      if (options.updateInfo) {
        args.push("--update-info", "False");
      }
      args.push("--data", requireDataPath(descriptor), NO_PROGRESS);
      return { entryPoint, args, source: descriptor.metaPath };
    },
  };
}

function clinical(category: StepCategory): CatalogEntry {
  return dataImport(category, ENTRY_POINTS.importClinicalData, {
    updateInfo: false,
    overwritable: true,
  });
}

function resource(category: StepCategory, entryPoint: string): CatalogEntry {
  return dataImport(category, entryPoint, { updateInfo: false, overwritable: false });
}

function profile(category: StepCategory): CatalogEntry {
  return dataImport(category, ENTRY_POINTS.importProfileData, {
    updateInfo: true,
    overwritable: true,
  });
}

export const STEP_CATALOG: Record<FileKind, CatalogEntry> = {
  CANCER_TYPE: {
    category: "CANCER_TYPE",
    build: (d) => ({
      entryPoint: ENTRY_POINTS.importTypesOfCancers,
      // "false": keep cancer types that are already registered
      args: [requireDataPath(d), "false", NO_PROGRESS],
      source: d.metaPath,
    }),
  },
  STUDY: {
    category: "STUDY",
    build: (d) => ({
      entryPoint: ENTRY_POINTS.importCancerStudy,
      args: [d.metaPath, NO_PROGRESS],
      source: d.metaPath,
    }),
  },
  SAMPLE_ATTRIBUTES: clinical("SAMPLE_ATTRIBUTES"),
  PATIENT_ATTRIBUTES: clinical("PATIENT_ATTRIBUTES"),
  RESOURCE_DEFINITION: resource("RESOURCE_DEFINITION", ENTRY_POINTS.importResourceDefinition),
  RESOURCE_SAMPLE: resource("RESOURCE_SAMPLE", ENTRY_POINTS.importResourceData),
  RESOURCE_PATIENT: resource("RESOURCE_PATIENT", ENTRY_POINTS.importResourceData),
  RESOURCE_STUDY: resource("RESOURCE_STUDY", ENTRY_POINTS.importResourceData),
  SEG: dataImport("SEG", ENTRY_POINTS.importCopyNumberSegmentData, {
    updateInfo: false,
    overwritable: false,
  }),
  CNA_CONTINUOUS: profile("CNA_CONTINUOUS"),
  CNA_DISCRETE: profile("CNA_DISCRETE"),
  EXPRESSION: profile("EXPRESSION"),
  EXPRESSION_ZSCORE: profile("EXPRESSION_ZSCORE"),
  METHYLATION: profile("METHYLATION"),
  PROTEIN: profile("PROTEIN"),
  MUTATION: profile("MUTATION"),
  STRUCTURAL_VARIANT: profile("STRUCTURAL_VARIANT"),
  TREATMENT_RESPONSE: profile("TREATMENT_RESPONSE"),
  GSVA_SCORES: profile("GSVA_SCORES"),
  GSVA_PVALUES: profile("GSVA_PVALUES"),
  GENERIC_ASSAY: profile("GENERIC_ASSAY"),
  MUTATIONAL_SIGNATURE: profile("MUTATIONAL_SIGNATURE"),
  GISTIC_GENES: {
    category: "GISTIC_GENES",
    build: (d, ctx) => ({
      entryPoint: ENTRY_POINTS.importGisticData,
      args: ["--data", requireDataPath(d), "--study", ctx.studyId, NO_PROGRESS],
      source: d.metaPath,
    }),
  },
  GENE_PANEL_MATRIX: {
    category: "GENE_PANEL_MATRIX",
    build: (d) => ({
      entryPoint: ENTRY_POINTS.importGenePanelProfileMap,
      args: ["--meta", d.metaPath, "--data", requireDataPath(d), NO_PROGRESS],
      source: d.metaPath,
    }),
  },
  SAMPLE_LIST: {
    category: "SAMPLE_LIST",
    build: (d) => ({
      entryPoint: ENTRY_POINTS.importSampleList,
      args: [d.metaPath, NO_PROGRESS],
      source: d.metaPath,
    }),
  },
};

/**
 * Lookup the catalog entry for a kind. Fails loudly for a kind the catalog
 * does not know, which means the classifier and catalog disagree.
 */
export function getCatalogEntry(kind: FileKind): CatalogEntry {
  const entry: CatalogEntry | undefined = STEP_CATALOG[kind];
  if (!entry) throw configurationError(`No import step is cataloged for file kind: ${kind}`);
  return entry;
}

/**
 * Build the import step for one descriptor, or null when the kind does not
 * take part in the context's load mode.
 */
export function buildImportStep(
  descriptor: FileDescriptor,
  context: PlanContext,
): ImportStep | null {
  const entry = getCatalogEntry(descriptor.kind);
  if (context.mode === "incremental" && !INCREMENTAL_KINDS.has(descriptor.kind)) {
    return null;
  }
  return { category: entry.category, ...entry.build(descriptor, context) };
}

// ── Synthesized steps ──────────────────────────────────────────────

export function versionCheckStep(): ImportStep {
  return { category: "VERSION_CHECK", entryPoint: ENTRY_POINTS.versionUtil, args: [] };
}

export function removeStudyStep(studyId: string): ImportStep {
  return {
    category: "REMOVE_STUDY",
    entryPoint: ENTRY_POINTS.removeCancerStudy,
    args: [studyId, NO_PROGRESS],
  };
}

export function addAllCaseListStep(studyId: string): ImportStep {
  return {
    category: "ADD_ALL_CASE_LIST",
    entryPoint: ENTRY_POINTS.addCaseList,
    args: [studyId, "all", NO_PROGRESS],
  };
}

export function markAvailableStep(studyId: string): ImportStep {
  return {
    category: "MARK_AVAILABLE",
    entryPoint: ENTRY_POINTS.updateCancerStudy,
    args: [studyId, "AVAILABLE", NO_PROGRESS],
  };
}

export function updateCaseListsStep(sampleMetaPath: string, caseListDir?: string): ImportStep {
  const args = ["--meta", sampleMetaPath];
  if (caseListDir) args.push("--case-lists", caseListDir);
  return {
    category: "UPDATE_CASE_LISTS",
    entryPoint: ENTRY_POINTS.updateCaseListsSampleIds,
    args,
    source: sampleMetaPath,
  };
}

export function removeSamplesStep(studyIds: string[], sampleIds: string[]): ImportStep {
  return {
    category: "SINGLE_OPERATION",
    entryPoint: ENTRY_POINTS.removeSamples,
    args: ["--study_ids", studyIds.join(","), "--sample_ids", sampleIds.join(","), NO_PROGRESS],
  };
}
