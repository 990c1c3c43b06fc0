/**
 * Environment Configuration
 *
 * Reads importer settings from the process environment (a `.env` file is
 * loaded by the CLI through `dotenv/config`). CLI flags override these.
 */

import { z } from "zod";

export const EnvConfigSchema = z.object({
  PORTAL_HOME: z.string().min(1).optional(),
  IMPORTER_JAR: z.string().min(1).optional(),
  JAVA_BIN: z.string().min(1).default("java"),
  SPRING_PROFILE: z.string().min(1).default("dbcp"),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // Empty strings count as unset.
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(EnvConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }
  return EnvConfigSchema.parse(cleaned);
}
