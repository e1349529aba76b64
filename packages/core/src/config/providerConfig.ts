import { z } from 'zod';
import { ConfigurationError } from '../errors/errors';
import { Logger } from '../logger';
import { CloudProviderConfig, ProviderConfig, ProviderName } from '../types';
import { ConfigSource } from './configSource';

/** Built-in identity and defaults for one backend. */
export interface ProviderDefaults {
  providerName: ProviderName;
  displayName: string;
  envPrefix: string;
  baseUrl: string;
  modelId: string;
  timeoutSeconds: number;
}

/** Explicit values that win over both the environment and the defaults. */
export interface ProviderOverrides {
  baseUrl?: string;
  modelId?: string;
  timeoutSeconds?: number;
}

export const OLLAMA_DEFAULTS: ProviderDefaults = {
  providerName: 'ollama',
  displayName: 'Ollama',
  envPrefix: 'OLLAMA',
  baseUrl: 'http://localhost:11434',
  modelId: 'llama3.2',
  timeoutSeconds: 300,
};

export const OPENROUTER_DEFAULTS: ProviderDefaults = {
  providerName: 'openrouter',
  displayName: 'OpenRouter',
  envPrefix: 'OPENROUTER',
  baseUrl: 'https://openrouter.ai/api/v1',
  modelId: 'openai/gpt-3.5-turbo',
  timeoutSeconds: 60,
};

export const DEFAULT_REFERER = 'https://github.com/architect-critic/architect-critic';
export const DEFAULT_APP_TITLE = 'architect-critic';

const NO_HEADERS: Readonly<Record<string, string>> = {};

const positiveNumber = z.coerce.number().finite().positive();
const positiveInteger = z.coerce.number().int().positive();

/** Returns the value unless it is missing or blank. */
function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Resolves the base URL: override, then `<PREFIX>_API_BASE`, then `<PREFIX>_BASE_URL`, then default.
 */
function resolveBaseUrl(defaults: ProviderDefaults, source: ConfigSource, override?: string): string {
  // Explicit override wins, even when empty (validated later).
  if (override !== undefined) return override.trim();
  // Two accepted spellings of the prefix variable.
  for (const name of [`${defaults.envPrefix}_API_BASE`, `${defaults.envPrefix}_BASE_URL`]) {
    const value = present(source.get(name));
    if (value) return value;
  }
  return defaults.baseUrl;
}

/**
 * Resolves the model id: override, then `<PREFIX>_MODEL`, then `<PREFIX>_MCP_MODEL`, then default.
 * A variable that is set but empty is kept (and rejected later).
 */
function resolveModelId(defaults: ProviderDefaults, source: ConfigSource, override?: string): string {
  if (override !== undefined) return override.trim();
  // Two accepted spellings of the model variable.
  for (const name of [`${defaults.envPrefix}_MODEL`, `${defaults.envPrefix}_MCP_MODEL`]) {
    const value = source.get(name);
    if (value !== undefined) return value.trim();
  }
  return defaults.modelId;
}

/**
 * Resolves the timeout. Invalid or non-positive values fall back to the default with a warning.
 */
function resolveTimeout(
  defaults: ProviderDefaults,
  source: ConfigSource,
  logger: Logger,
  override?: number
): number {
  const variable = `${defaults.envPrefix}_TIMEOUT`;
  const raw = override !== undefined ? String(override) : source.get(variable);
  if (raw === undefined) return defaults.timeoutSeconds;

  const parsed = positiveNumber.safeParse(raw.trim() === '' ? Number.NaN : raw);
  if (!parsed.success) {
    logger.warn(`Invalid ${variable} value: ${raw}. Using default: ${defaults.timeoutSeconds}`);
    return defaults.timeoutSeconds;
  }
  return parsed.data;
}

/** Optional `<PREFIX>_MAX_INPUT_TOKENS`; invalid values are ignored with a warning. */
function resolveMaxInputTokens(defaults: ProviderDefaults, source: ConfigSource, logger: Logger): number | undefined {
  const variable = `${defaults.envPrefix}_MAX_INPUT_TOKENS`;
  const raw = present(source.get(variable));
  if (raw === undefined) return undefined;

  const parsed = positiveInteger.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Invalid ${variable} value: ${raw}. Prompt size will not be limited`);
    return undefined;
  }
  return parsed.data;
}

/**
 * Resolves the connection parameters of one backend from layered defaults and overrides.
 *
 * Precedence: explicit override > prefix variable > built-in default.
 *
 * @param defaults Built-in identity and defaults of the backend.
 * @param source Where named values come from.
 * @param logger Logger for warnings and the resolved values.
 * @param overrides Explicit values (e.g. from command line flags).
 * @returns The resolved, read-only configuration.
 * @throws ConfigurationError when the base URL or model id ends up empty.
 */
export function resolveProviderConfig(
  defaults: ProviderDefaults,
  source: ConfigSource,
  logger: Logger,
  overrides: ProviderOverrides = {}
): ProviderConfig {
  const prefix = defaults.envPrefix;
  // Strip trailing separators so endpoint paths can be appended directly.
  const baseUrl = resolveBaseUrl(defaults, source, overrides.baseUrl).replace(/\/+$/, '');
  const modelId = resolveModelId(defaults, source, overrides.modelId);
  const timeoutSeconds = resolveTimeout(defaults, source, logger, overrides.timeoutSeconds);
  const maxInputTokens = resolveMaxInputTokens(defaults, source, logger);

  if (!baseUrl) {
    throw new ConfigurationError(`${prefix}_API_BASE cannot be empty`);
  }
  if (!modelId) {
    throw new ConfigurationError(`${prefix}_MODEL cannot be empty`);
  }
  if (!/^https?:\/\//.test(baseUrl)) {
    logger.warn(`${prefix}_API_BASE should start with http:// or https://. Got: ${baseUrl}`);
  }

  logger.info(`Using ${defaults.displayName} configuration`, { baseUrl, modelId, timeoutSeconds });

  return Object.freeze({
    providerName: defaults.providerName,
    displayName: defaults.displayName,
    envPrefix: prefix,
    baseUrl,
    modelId,
    timeoutSeconds,
    extraHeaders: NO_HEADERS,
    maxInputTokens,
  });
}

/** Local inference server (Ollama). */
export function resolveOllamaConfig(
  source: ConfigSource,
  logger: Logger,
  overrides?: ProviderOverrides
): ProviderConfig {
  return resolveProviderConfig(OLLAMA_DEFAULTS, source, logger, overrides);
}

/**
 * Cloud aggregator (OpenRouter). Requires `OPENROUTER_API_KEY` and adds attribution headers.
 * @throws ConfigurationError when the API key is missing.
 */
export function resolveOpenRouterConfig(
  source: ConfigSource,
  logger: Logger,
  overrides?: ProviderOverrides
): CloudProviderConfig {
  const base = resolveProviderConfig(OPENROUTER_DEFAULTS, source, logger, overrides);

  const apiKey = present(source.get('OPENROUTER_API_KEY'));
  if (!apiKey) {
    throw new ConfigurationError('OPENROUTER_API_KEY is required for OpenRouter API access');
  }
  logger.info('OpenRouter API key configured');

  return Object.freeze({
    ...base,
    apiKey,
    extraHeaders: Object.freeze({
      'HTTP-Referer': present(source.get('OPENROUTER_REFERER')) ?? DEFAULT_REFERER,
      'X-Title': present(source.get('OPENROUTER_APP_TITLE')) ?? DEFAULT_APP_TITLE,
    }),
  });
}

/**
 * Human-readable summary of a configuration. Never includes credentials.
 */
export function describeConfig(config: ProviderConfig): string {
  const prefix = config.envPrefix;
  return [
    `Current ${config.displayName} configuration:`,
    '',
    `API base: ${config.baseUrl}`,
    `Model: ${config.modelId}`,
    `Timeout: ${config.timeoutSeconds}s`,
    `Max input tokens: ${config.maxInputTokens ?? 'unlimited'}`,
    '',
    'To change these, set environment variables:',
    `- ${prefix}_API_BASE (or ${prefix}_BASE_URL)`,
    `- ${prefix}_MODEL (or ${prefix}_MCP_MODEL)`,
    `- ${prefix}_TIMEOUT`,
    `- ${prefix}_MAX_INPUT_TOKENS`,
  ].join('\n');
}
