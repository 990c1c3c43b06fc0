/**
 * Load-Mode Selector
 *
 * - full:         a whole-study directory was given (`--study_directory`).
 * - incremental:  a delta directory was given (`--data_directory`); clinical
 *                 and mutation steps overwrite what is already loaded.
 *
 * This is the only place the mode is derived; everything downstream reads
 * it from the PlanContext.
 */

import { configurationError } from "../shared/errors.js";
import type { LoadMode } from "./types.js";

export interface DirectoryArgs {
  studyDirectory?: string;
  dataDirectory?: string;
}

export interface LoadTarget {
  mode: LoadMode;
  directory: string;
}

export function selectLoadMode(args: DirectoryArgs): LoadTarget {
  const { studyDirectory, dataDirectory } = args;
  if (studyDirectory && dataDirectory) {
    throw configurationError("--study_directory and --data_directory are mutually exclusive");
  }
  if (studyDirectory) return { mode: "full", directory: studyDirectory };
  if (dataDirectory) return { mode: "incremental", directory: dataDirectory };
  throw configurationError("One of --study_directory or --data_directory is required");
}
