import dotenv from 'dotenv';

/**
 * Supplies named string values. Absence means "use the default".
 */
export interface ConfigSource {
  get(name: string): string | undefined;
}

/**
 * Config source backed by process environment variables.
 *
 * Loads `.env` first when reading the live environment outside production.
 * @param env Environment map to read from (defaults to process.env).
 */
export function envConfigSource(env: NodeJS.ProcessEnv = process.env): ConfigSource {
  if (env === process.env && process.env.NODE_ENV !== 'production') {
    dotenv.config();
  }
  return { get: (name) => env[name] };
}

/** Config source over a fixed map; handy for callers that already hold values. */
export function staticConfigSource(values: Record<string, string | undefined>): ConfigSource {
  return { get: (name) => values[name] };
}
