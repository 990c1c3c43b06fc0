/**
 * Importer jar lookup. Runs once, before any step is launched.
 *
 * Resolution order: explicit path → IMPORTER_JAR → a single `core-*.jar`
 * under PORTAL_HOME (its `core/target/` build output or its root).
 */

import { existsSync } from "fs";
import path from "path";
import { globSync } from "glob";

import { configurationError } from "../shared/errors.js";
import type { EnvConfig } from "../shared/env_config.js";

const JAR_PATTERNS = ["core/target/core-*.jar", "core-*.jar"];

export interface JarLookup {
  jarPath?: string;
  env: Pick<EnvConfig, "IMPORTER_JAR" | "PORTAL_HOME">;
}

export function locateJar(lookup: JarLookup): string {
  const explicit = lookup.jarPath ?? lookup.env.IMPORTER_JAR;
  if (explicit) {
    const resolved = path.resolve(explicit);
    if (!existsSync(resolved)) {
      throw configurationError(`Importer jar not found: ${resolved}`);
    }
    return resolved;
  }

  const home = lookup.env.PORTAL_HOME;
  if (!home) {
    throw configurationError(
      "Cannot locate the importer jar: pass --jar_path or set IMPORTER_JAR or PORTAL_HOME",
    );
  }

  for (const pattern of JAR_PATTERNS) {
    const matches = globSync(pattern, { cwd: home, absolute: true, nodir: true }).sort();
    if (matches.length === 1) return matches[0];
    if (matches.length > 1) {
      throw configurationError(
        `Found ${matches.length} candidate jars under ${home} (${pattern}); pass --jar_path to choose one`,
      );
    }
  }

  throw configurationError(`No core-*.jar found under ${home}`);
}
