/**
 * Meta File Reader
 *
 * Meta files are small `key: value` headers that name the kind of a
 * study file and point at its bulk data file:
 *
 *   cancer_study_identifier: study_es_0
 *   genetic_alteration_type: MUTATION_EXTENDED
 *   datatype: MAF
 *   data_filename: data_mutations_extended.maf
 */

import { readFileSync } from "fs";
import path from "path";
import type { MetaHeader } from "./types.js";

const META_FILE_PATTERN = /^meta_.+\.(txt|yaml|yml)$/;

export function isMetaFileName(filename: string): boolean {
  return META_FILE_PATTERN.test(filename);
}

/**
 * Parse meta header text. Blank lines and `#` comments are skipped; the
 * first colon separates key from value; later keys win.
 */
export function parseMetaHeader(text: string): MetaHeader {
  const header: MetaHeader = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    header[key] = value;
  }
  return header;
}

export function readMetaFile(metaPath: string): MetaHeader {
  return parseMetaHeader(readFileSync(metaPath, "utf-8"));
}

/** Resolve the data file a meta header points at, relative to the meta file. */
export function resolveDataPath(metaPath: string, header: MetaHeader): string | undefined {
  const filename = header["data_filename"];
  if (!filename) return undefined;
  return path.join(path.dirname(metaPath), filename);
}
