/**
 * Study loader errors. A failing importer step is not thrown; it is
 * reported through the run result.
 *
 * - classification:  a meta file is unusable (missing data file, wrong study).
 * - configuration:   bad arguments, uncataloged kind, no importer jar.
 * - usage:           the command line could not be parsed.
 */

export type StudyLoaderErrorKind =
  | "classification"
  | "configuration"
  | "usage";

export class StudyLoaderError extends Error {
  readonly kind: StudyLoaderErrorKind;

  constructor(kind: StudyLoaderErrorKind, message: string) {
    super(message);
    this.name = "StudyLoaderError";
    this.kind = kind;
  }
}

export function classificationError(message: string): StudyLoaderError {
  return new StudyLoaderError("classification", message);
}

export function configurationError(message: string): StudyLoaderError {
  return new StudyLoaderError("configuration", message);
}
