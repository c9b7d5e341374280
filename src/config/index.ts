import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    return '';
  });
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

const DuoSchema = z.object({
  api_host: z.string().default(''),
  integration_key: z.string().default(''),
  secret_key: z.string().default(''),
  timeout_ms: z.number().positive().default(10000),
});

const ConfigSchema = z.object({
  duo: DuoSchema.default({}),
  cache: z
    .object({
      ttl_seconds: z.number().positive().default(5),
      max_entries: z.number().int().positive().default(100_000_000),
      cleanup_interval_seconds: z.number().positive().default(60),
    })
    .default({}),
  server: z
    .object({
      listen_port: z.number().int().default(8080),
      host: z.string().default('0.0.0.0'),
      api_key: z.string().min(1).optional(),
      rate_limit_max: z.number().int().positive().default(100),
      rate_limit_window_ms: z.number().int().min(1000).default(60000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
});

// Credentials may come from the file or the environment, so they are only
// required once both sources are merged.
const ResolvedConfigSchema = ConfigSchema.extend({
  duo: DuoSchema.extend({
    api_host: z.string().min(1, 'duo.api_host is required'),
    integration_key: z.string().min(1, 'duo.integration_key is required'),
    secret_key: z.string().min(1, 'duo.secret_key is required'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type EnvValues = Record<string, string | number | undefined>;

export interface ConfigOverrides {
  duo: Record<string, string | number>;
  cache: Record<string, string | number>;
  server: Record<string, string | number>;
  logging: Record<string, string | number>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    // Interpolate environment variables in config values
    const processed = processEnvVars(parsed ?? {});
    return ConfigSchema.parse(processed);
  } catch (error) {
    if (isMissingFile(error)) {
      // Config file doesn't exist, use defaults
      return ConfigSchema.parse({});
    }
    throw error;
  }
}

function intFromEnv(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

function definedOnly(values: EnvValues): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Overrides taken from environment variables. Only variables that are set
 * produce a value, so unset ones never mask the file. Values are checked when
 * merged by resolveConfig.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    duo: definedOnly({
      api_host: env.DUO_API_HOST,
      integration_key: env.DUO_INTEGRATION_KEY,
      secret_key: env.DUO_SECRET_KEY,
      timeout_ms: intFromEnv(env.DUO_TIMEOUT_MS),
    }),
    cache: definedOnly({
      ttl_seconds: intFromEnv(env.CACHE_TTL_SECONDS),
      max_entries: intFromEnv(env.CACHE_MAX_ENTRIES),
    }),
    server: definedOnly({
      listen_port: intFromEnv(env.LISTEN_PORT),
      api_key: env.API_KEY,
    }),
    logging: definedOnly({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    }),
  };
}

/**
 * Merge file and environment configuration (env overrides file) and check
 * that provider credentials are present.
 */
export function resolveConfig(fileConfig: Config, envConfig: ConfigOverrides): Config {
  return ResolvedConfigSchema.parse({
    duo: { ...fileConfig.duo, ...envConfig.duo },
    cache: { ...fileConfig.cache, ...envConfig.cache },
    server: { ...fileConfig.server, ...envConfig.server },
    logging: { ...fileConfig.logging, ...envConfig.logging },
  });
}
