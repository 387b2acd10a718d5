/**
 * Configuration for the CLI runner: logging and output settings.
 *
 * Resolution priority: explicit overrides > environment vars > defaults.
 * Command options are never read from here; they come from argv only.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { detectColorSupport } from '../cli/renderers/colors.js';
import type { CliConfig, CliConfigOverrides } from '../types/config.js';

/** Default configuration values. */
const DEFAULTS: CliConfig = {
  logging: {
    level: 'warn',
    filePath: null,
  },
  output: {
    showColor: null,
  },
};

type Section = keyof CliConfig;

/** Environment variable to config section/key mapping. */
const ENV_MAP: Record<string, readonly [Section, string]> = {
  'CMDTREE_LOG_LEVEL': ['logging', 'level'],
  'CMDTREE_LOG_FILE': ['logging', 'filePath'],
  'CMDTREE_SHOW_COLOR': ['output', 'showColor'],
};

export const CliConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    filePath: z.string().min(1).nullable(),
  }),
  output: z.object({
    showColor: z.boolean().nullable(),
  }),
});

/**
 * Parse an environment variable value to the appropriate type.
 * An empty value resets the key to null.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() === '') return null;
  return value;
}

/** Drop keys whose value is undefined so they do not mask lower layers. */
function defined(values: object | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values ?? {}).filter(([, v]) => v !== undefined));
}

/**
 * Load the runner configuration.
 * Priority: defaults < environment vars < overrides
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliConfigOverrides = {},
): CliConfig {
  const fromEnv: Record<Section, Record<string, unknown>> = { logging: {}, output: {} };
  for (const [envKey, [section, key]] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      fromEnv[section][key] = parseEnvValue(envValue);
    }
  }
  // https://no-color.org
  if (env['NO_COLOR'] !== undefined && env['CMDTREE_SHOW_COLOR'] === undefined) {
    fromEnv.output['showColor'] = false;
  }

  const merged = {
    logging: { ...DEFAULTS.logging, ...fromEnv.logging, ...defined(overrides.logging) },
    output: { ...DEFAULTS.output, ...fromEnv.output, ...defined(overrides.output) },
  };

  const result = CliConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/** Whether error output should be painted, detecting from `stream` when unset. */
export function resolveShowColor(
  config: CliConfig,
  env: NodeJS.ProcessEnv = process.env,
  stream: { isTTY?: boolean } = process.stderr,
): boolean {
  return config.output.showColor ?? detectColorSupport(env, stream);
}
