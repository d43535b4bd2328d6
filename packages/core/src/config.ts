/**
 * Engine configuration: explicit options > environment > defaults
 */

import { z } from 'zod';
import type { ZodError } from 'zod';

export const DEFAULT_MAX_DEPTH = 1000;

const engineConfigSchema = z.object({
  maxDepth: z.number().int().min(2),
  compressTraces: z.boolean(),
  debug: z.boolean(),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

const envSchema = z.object({
  DEEPCALL_MAX_DEPTH: z.coerce.number().int().min(2).optional(),
  DEEPCALL_COMPRESS_TRACES: z.stringbool().optional(),
  DEEPCALL_DEBUG: z.stringbool().optional(),
});

export type EngineEnv = Record<string, string | undefined>;

/**
 * Configuration error listing every failed setting as `setting: problem`
 */
function configError(source: string, error: ZodError): Error {
  const problems = error.issues.map(({ path, message }) =>
    path.length ? `${path.map(String).join('.')}: ${message}` : message
  );
  return new Error(`Invalid ${source}: ${problems.join('; ') || error.message}`);
}

/**
 * Read DEEPCALL_* variables; empty values count as unset
 */
export function readEnvConfig(env: EngineEnv): Partial<EngineConfig> {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('DEEPCALL_') && value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw configError('environment', parsed.error);
  }

  const config: Partial<EngineConfig> = {};
  if (parsed.data.DEEPCALL_MAX_DEPTH !== undefined) config.maxDepth = parsed.data.DEEPCALL_MAX_DEPTH;
  if (parsed.data.DEEPCALL_COMPRESS_TRACES !== undefined) config.compressTraces = parsed.data.DEEPCALL_COMPRESS_TRACES;
  if (parsed.data.DEEPCALL_DEBUG !== undefined) config.debug = parsed.data.DEEPCALL_DEBUG;
  return config;
}

export function resolveEngineConfig(options: Partial<EngineConfig>, env: EngineEnv): EngineConfig {
  const defined = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
  const parsed = engineConfigSchema.safeParse({
    maxDepth: DEFAULT_MAX_DEPTH,
    compressTraces: true,
    debug: false,
    ...readEnvConfig(env),
    ...defined,
  });
  if (!parsed.success) {
    throw configError('engine config', parsed.error);
  }
  return parsed.data;
}
