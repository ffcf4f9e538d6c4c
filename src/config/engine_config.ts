/**
 * @fileoverview Engine configuration
 *
 * Every tunable constant of the algorithms lives here with its default.
 * Values come from, in increasing precedence: the defaults, an optional YAML
 * file, `ARCH_ENGINE_*` environment variables, and explicit overrides.
 */

import * as fs from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage, type InputIssue } from '../core/errors.js';

// ============================================================================
// DEFAULTS
// ============================================================================

/** Seed for community detection; a fixed default keeps runs reproducible. */
export const DEFAULT_COMMUNITY_SEED = 42;
/** Power-iteration cap for eigenvector centrality. */
export const DEFAULT_EIGENVECTOR_MAX_ITERATIONS = 100;
/** L1 change between iterations below which eigenvector centrality has converged. */
export const DEFAULT_EIGENVECTOR_TOLERANCE = 1e-6;

// ============================================================================
// SCHEMA
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const EngineConfigSchema = z.object({
  communitySeed: z.number().int().default(DEFAULT_COMMUNITY_SEED),
  communityResolution: z.number().positive().default(1),
  communityMaxIterations: z.number().int().positive().default(20),
  communityMaxLevels: z.number().int().positive().default(10),
  eigenvectorMaxIterations: z.number().int().positive().default(DEFAULT_EIGENVECTOR_MAX_ITERATIONS),
  eigenvectorTolerance: z.number().positive().default(DEFAULT_EIGENVECTOR_TOLERANCE),
  exclusionTransitiveByDefault: z.boolean().default(false),
  /** Process-wide logger threshold; left alone when unset */
  logLevel: LogLevelSchema.optional(),
}).strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

const ENV_KEYS: Record<string, keyof EngineConfig> = {
  ARCH_ENGINE_COMMUNITY_SEED: 'communitySeed',
  ARCH_ENGINE_COMMUNITY_RESOLUTION: 'communityResolution',
  ARCH_ENGINE_COMMUNITY_MAX_ITERATIONS: 'communityMaxIterations',
  ARCH_ENGINE_COMMUNITY_MAX_LEVELS: 'communityMaxLevels',
  ARCH_ENGINE_EIGENVECTOR_MAX_ITERATIONS: 'eigenvectorMaxIterations',
  ARCH_ENGINE_EIGENVECTOR_TOLERANCE: 'eigenvectorTolerance',
  ARCH_ENGINE_EXCLUSION_TRANSITIVE: 'exclusionTransitiveByDefault',
  ARCH_ENGINE_LOG_LEVEL: 'logLevel',
};

const BOOLEAN_VALUES = new Map<string, boolean>([
  ['true', true],
  ['1', true],
  ['false', false],
  ['0', false],
]);

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Validate a partial config and fill in defaults.
 */
export function resolveEngineConfig(input: unknown = {}, source = 'overrides'): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(source, toIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read `ARCH_ENGINE_*` variables into a partial config. Numbers and booleans
 * are coerced here; range checks happen in the schema.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    if (key === 'logLevel') {
      values[key] = raw.toLowerCase();
    } else if (key === 'exclusionTransitiveByDefault') {
      const flag = BOOLEAN_VALUES.get(raw.toLowerCase());
      if (flag === undefined) {
        throw new ConfigurationError('environment', [{ path: name, message: `expected true, false, 1 or 0, got '${raw}'` }]);
      }
      values[key] = flag;
    } else {
      const numeric = Number(raw);
      if (Number.isNaN(numeric)) {
        throw new ConfigurationError('environment', [{ path: name, message: `expected a number, got '${raw}'` }]);
      }
      values[key] = numeric;
    }
  }
  return values;
}

export interface LoadEngineConfigOptions {
  /** YAML file with any subset of the config keys */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
}

export async function loadEngineConfig(options: LoadEngineConfigOptions = {}): Promise<EngineConfig> {
  let fromFile: Record<string, unknown> = {};
  if (options.file) {
    fromFile = await readConfigFile(options.file);
    // Reject unknown keys and bad values with the file named as the source.
    resolveEngineConfig(fromFile, options.file);
  }
  const fromEnv = readEnvConfig(options.env ?? process.env);
  resolveEngineConfig(fromEnv, 'environment');
  return resolveEngineConfig({ ...fromFile, ...fromEnv, ...(options.overrides ?? {}) });
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(file, [{ path: '', message: `cannot read file: ${getErrorMessage(error)}` }], error instanceof Error ? error : undefined);
  }
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(file, [{ path: '', message: `invalid YAML: ${getErrorMessage(error)}` }], error instanceof Error ? error : undefined);
  }
  if (document === null || document === undefined) return {};
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigurationError(file, [{ path: '', message: 'expected a mapping of config keys' }]);
  }
  return { ...document };
}

function toIssues(error: z.ZodError): InputIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}
