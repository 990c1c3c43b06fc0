/**
 * File Classifier: scans a study directory and produces one FileDescriptor
 * per recognized meta file and per case list file.
 *
 * Kinds are read from the meta header (`genetic_alteration_type` +
 * `datatype`), not from file names, so any naming scheme works. Headers
 * that match nothing are reported as ignored.
 */

import { existsSync, readdirSync, statSync } from "fs";
import path from "path";

import { isMetaFileName, readMetaFile, resolveDataPath } from "./meta_file.js";
import { classificationError } from "../shared/errors.js";
import type {
  ClassifiedDirectory,
  FileDescriptor,
  FileKind,
  LoadMode,
  MetaHeader,
} from "./types.js";

export const CASE_LIST_DIRNAME = "case_lists";

// genetic_alteration_type → datatype → kind
const ALTERATION_KINDS: Record<string, Record<string, FileKind>> = {
  CANCER_TYPE: { CANCER_TYPE: "CANCER_TYPE" },
  CLINICAL: {
    SAMPLE_ATTRIBUTES: "SAMPLE_ATTRIBUTES",
    PATIENT_ATTRIBUTES: "PATIENT_ATTRIBUTES",
  },
  RESOURCE: {
    DEFINITION: "RESOURCE_DEFINITION",
    SAMPLE_RESOURCE: "RESOURCE_SAMPLE",
    PATIENT_RESOURCE: "RESOURCE_PATIENT",
    STUDY_RESOURCE: "RESOURCE_STUDY",
  },
  COPY_NUMBER_ALTERATION: {
    SEG: "SEG",
    "LOG2-VALUE": "CNA_CONTINUOUS",
    CONTINUOUS: "CNA_CONTINUOUS",
    DISCRETE: "CNA_DISCRETE",
    DISCRETE_LONG: "CNA_DISCRETE",
  },
  MRNA_EXPRESSION: {
    CONTINUOUS: "EXPRESSION",
    DISCRETE: "EXPRESSION",
    "Z-SCORE": "EXPRESSION_ZSCORE",
  },
  METHYLATION: { CONTINUOUS: "METHYLATION" },
  PROTEIN_LEVEL: {
    "LOG2-VALUE": "PROTEIN",
    "Z-SCORE": "PROTEIN",
  },
  MUTATION_EXTENDED: { MAF: "MUTATION" },
  MUTATION_UNCALLED: { MAF: "MUTATION" },
  STRUCTURAL_VARIANT: { SV: "STRUCTURAL_VARIANT" },
  GISTIC_GENES_AMP: { "Q-VALUE": "GISTIC_GENES" },
  GISTIC_GENES_DEL: { "Q-VALUE": "GISTIC_GENES" },
  GENESET_SCORE: {
    "GSVA-SCORE": "GSVA_SCORES",
    "P-VALUE": "GSVA_PVALUES",
  },
  GENE_PANEL_MATRIX: { GENE_PANEL_MATRIX: "GENE_PANEL_MATRIX" },
};

const GENERIC_ASSAY_DATATYPES = new Set(["LIMIT-VALUE", "CATEGORICAL", "BINARY"]);

const GENERIC_ASSAY_KINDS: Record<string, FileKind> = {
  TREATMENT_RESPONSE: "TREATMENT_RESPONSE",
  MUTATIONAL_SIGNATURE: "MUTATIONAL_SIGNATURE",
};

/** Kinds that are pure declarations and carry no bulk data file. */
const DECLARATION_KINDS = new Set<FileKind>(["STUDY", "SAMPLE_LIST"]);

export function requiresDataFile(kind: FileKind): boolean {
  return !DECLARATION_KINDS.has(kind);
}

/**
 * Determine a meta header's kind, or null when it matches no known kind.
 */
export function detectFileKind(header: MetaHeader): FileKind | null {
  const alteration = header["genetic_alteration_type"]?.toUpperCase();
  const datatype = header["datatype"]?.toUpperCase();

  if (!alteration) {
    if (header["type_of_cancer"] && header["cancer_study_identifier"]) return "STUDY";
    return null;
  }
  if (!datatype) return null;

  if (alteration === "GENERIC_ASSAY") {
    if (!GENERIC_ASSAY_DATATYPES.has(datatype)) return null;
    const assayType = header["generic_assay_type"]?.toUpperCase() ?? "";
    return GENERIC_ASSAY_KINDS[assayType] ?? "GENERIC_ASSAY";
  }

  return ALTERATION_KINDS[alteration]?.[datatype] ?? null;
}

/** Hidden files and editor backups (`.DS_Store`, `cases_all.txt~`). */
function isStrayFileName(name: string): boolean {
  return name.startsWith(".") || name.endsWith("~");
}

function listFiles(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => !isStrayFileName(name))
    .filter((name) => statSync(path.join(dir, name)).isFile())
    .sort();
}

interface MetaEntry {
  metaPath: string;
  header: MetaHeader;
  kind: FileKind;
}

/**
 * Classify every file of a study (full) or delta (incremental) directory.
 *
 * Throws a classification error when the directory is missing, when a meta
 * file names a data file that is absent, when the study id cannot be
 * resolved, or when a file belongs to another study.
 */
export function classifyStudyDirectory(dir: string, mode: LoadMode): ClassifiedDirectory {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw classificationError(`Study directory not found: ${dir}`);
  }

  const entries: MetaEntry[] = [];
  const ignored: string[] = [];

  for (const filename of listFiles(dir)) {
    if (!isMetaFileName(filename)) continue;
    const metaPath = path.join(dir, filename);
    const header = readMetaFile(metaPath);
    const kind = detectFileKind(header);
    if (kind === null) {
      ignored.push(metaPath);
      continue;
    }
    entries.push({ metaPath, header, kind });
  }

  const caseListDir = path.join(dir, CASE_LIST_DIRNAME);
  const hasCaseLists = existsSync(caseListDir) && statSync(caseListDir).isDirectory();
  const caseListPaths = hasCaseLists
    ? listFiles(caseListDir).map((filename) => path.join(caseListDir, filename))
    : [];

  const studyId = resolveStudyId(dir, entries, caseListPaths, mode);
  const descriptors: FileDescriptor[] = [];

  for (const entry of entries) {
    const declared = entry.header["cancer_study_identifier"];
    if (entry.kind !== "CANCER_TYPE" && declared !== undefined && declared !== studyId) {
      throw classificationError(
        `${entry.metaPath} belongs to study "${declared}", expected "${studyId}"`,
      );
    }

    const descriptor: FileDescriptor = {
      kind: entry.kind,
      metaPath: entry.metaPath,
      studyId,
    };

    if (requiresDataFile(entry.kind)) {
      const dataPath = resolveDataPath(entry.metaPath, entry.header);
      if (!dataPath) {
        throw classificationError(`${entry.metaPath} does not declare a data_filename`);
      }
      if (!existsSync(dataPath)) {
        throw classificationError(
          `Data file ${dataPath} referenced by ${entry.metaPath} does not exist`,
        );
      }
      descriptor.dataPath = dataPath;
    }

    descriptors.push(descriptor);
  }

  for (const caseListPath of caseListPaths) {
    descriptors.push({ kind: "SAMPLE_LIST", metaPath: caseListPath, studyId });
  }

  return {
    studyId,
    descriptors,
    caseListDir: hasCaseLists ? caseListDir : undefined,
    ignored,
  };
}

function resolveStudyId(
  dir: string,
  entries: MetaEntry[],
  caseListPaths: string[],
  mode: LoadMode,
): string {
  const study = entries.find((e) => e.kind === "STUDY");
  const fromStudy = study?.header["cancer_study_identifier"];
  if (fromStudy) return fromStudy;

  if (mode === "full") {
    throw classificationError(`No study meta file (with cancer_study_identifier) in ${dir}`);
  }

  for (const entry of entries) {
    const declared = entry.header["cancer_study_identifier"];
    if (declared) return declared;
  }
  // a delta holding only case lists
  for (const caseListPath of caseListPaths) {
    const declared = readMetaFile(caseListPath)["cancer_study_identifier"];
    if (declared) return declared;
  }
  throw classificationError(`Cannot resolve the study id of ${dir}: no meta file declares one`);
}
