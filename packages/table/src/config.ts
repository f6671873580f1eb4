/**
 * Environment and configuration resolution
 *
 * Priority: explicit overrides > ROWSTORE_* environment variables > defaults
 * ROWSTORE_DEBUG is read on each log call, see isDebugEnabled.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { RenderStyle } from "./types.js";

export interface TableConfig {
  /** Default grid style for Table.render() */
  renderStyle: RenderStyle;
  /** Indentation used when writing snapshots */
  snapshotIndent: number;
}

export const DEFAULT_CONFIG: Readonly<TableConfig> = {
  renderStyle: "sql",
  snapshotIndent: 2,
};

type Env = Record<string, string | undefined>;

const DebugFlagSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["1", "true", "yes", "on", "0", "false", "no", "off", ""]))
  .transform((value) => value === "1" || value === "true" || value === "yes" || value === "on");

const EnvSchema = z.object({
  ROWSTORE_RENDER_STYLE: z.enum(["simple", "sql"]).optional(),
  ROWSTORE_SNAPSHOT_INDENT: z.coerce.number().int().min(0).max(8).optional(),
});

/**
 * Check if debug logging is on (ROWSTORE_DEBUG=1|true|yes|on)
 * Unrecognized values count as off.
 */
export function isDebugEnabled(env: Env = process.env): boolean {
  const parsed = DebugFlagSchema.safeParse(env.ROWSTORE_DEBUG ?? "");
  return parsed.success && parsed.data;
}

/**
 * Resolve effective configuration
 * @param overrides - Values that take precedence over the environment
 * @param env - Environment to read (default: process.env)
 * @throws ConfigError if a ROWSTORE_* variable holds an invalid value
 */
export function resolveConfig(overrides: Partial<TableConfig> = {}, env: Env = process.env): TableConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`, { cause: parsed.error });
  }

  const fromEnv = parsed.data;
  return {
    renderStyle: overrides.renderStyle ?? fromEnv.ROWSTORE_RENDER_STYLE ?? DEFAULT_CONFIG.renderStyle,
    snapshotIndent:
      overrides.snapshotIndent ?? fromEnv.ROWSTORE_SNAPSHOT_INDENT ?? DEFAULT_CONFIG.snapshotIndent,
  };
}
