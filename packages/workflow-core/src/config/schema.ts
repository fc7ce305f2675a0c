/**
 * ## Engine Configuration
 *
 * Options shared by the specification registry and the transition executor.
 *
 * | Option | Default | Env override | Purpose |
 * |--------|---------|--------------|---------|
 * | `logging` | `false` | `WAYPOINT_LOGGING` | Write workflow logs to the console (otherwise no-op) |
 * | `logLevel` | `INFO` | `WAYPOINT_LOG_LEVEL` | Minimum level for scoped workflow loggers |
 * | `redeclare` | `merge` | `WAYPOINT_REDECLARE` | What re-declaring an existing state hook or event does |
 *
 * Precedence: explicit input > environment > schema default.
 */
import { z } from "zod";
import { WorkflowError } from "../errors/WorkflowError.js";
import { LOG_LEVELS } from "../logging/types.js";

/**
 * Policy for re-declaring an existing event or state hook while re-opening a
 * specification.
 *
 * - `merge`: the later declaration wins (events are replaced in place)
 * - `error`: the later declaration throws
 */
export const RedeclarePolicySchema = z.enum(["merge", "error"]);
export type RedeclarePolicy = z.infer<typeof RedeclarePolicySchema>;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const EngineConfigSchema = z.object({
  logging: z.boolean().default(false),
  logLevel: LogLevelSchema.default("INFO"),
  redeclare: RedeclarePolicySchema.default("merge"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Environment variables read by `resolveEngineConfig`.
 */
export const ENGINE_ENV_VARS = {
  LOGGING: "WAYPOINT_LOGGING",
  LOG_LEVEL: "WAYPOINT_LOG_LEVEL",
  REDECLARE: "WAYPOINT_REDECLARE",
} as const;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Error thrown when engine configuration fails validation.
 */
export class ConfigurationError extends WorkflowError<"WORKFLOW_INVALID_CONFIGURATION"> {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("WORKFLOW_INVALID_CONFIGURATION", `Invalid engine configuration: ${issues.join("; ")}`, {
      issues: [...issues],
    });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

type Env = Readonly<Record<string, string | undefined>>;

const ENV_BOOLEANS: Record<string, boolean> = {
  true: true,
  "1": true,
  false: false,
  "0": false,
};

function readEnv(env: Env): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  const logging = env[ENGINE_ENV_VARS.LOGGING];
  if (logging !== undefined && logging !== "") {
    // Unrecognised values are passed through so the schema reports them
    values["logging"] = ENV_BOOLEANS[logging.toLowerCase()] ?? logging;
  }
  const logLevel = env[ENGINE_ENV_VARS.LOG_LEVEL];
  if (logLevel !== undefined && logLevel !== "") {
    values["logLevel"] = logLevel.toUpperCase();
  }
  const redeclare = env[ENGINE_ENV_VARS.REDECLARE];
  if (redeclare !== undefined && redeclare !== "") {
    values["redeclare"] = redeclare.toLowerCase();
  }
  return values;
}

function definedEntries(input: EngineConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Resolve engine configuration from explicit input and the environment.
 *
 * @param input - Explicit options; undefined fields fall through to env/defaults
 * @param env - Environment to read overrides from (default: `process.env`)
 * @throws ConfigurationError listing every invalid field as `path: message`
 *
 * @example
 * ```typescript
 * const config = resolveEngineConfig({ redeclare: "error" });
 * // { logging: false, logLevel: "INFO", redeclare: "error" } with no WAYPOINT_* variables set
 * ```
 */
export function resolveEngineConfig(input: EngineConfigInput = {}, env: Env = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({ ...readEnv(env), ...definedEntries(input) });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
