import { Architect } from '../architect';
import { ConfigSource } from '../config/configSource';
import { ProviderOverrides, resolveOllamaConfig, resolveOpenRouterConfig } from '../config/providerConfig';
import { Logger } from '../logger';
import { ProviderName } from '../types';
import { OllamaProvider } from './ollamaProvider';
import { OpenRouterProvider } from './openRouterProvider';
import { ReviewProvider } from './types';

type ProviderFactory = (source: ConfigSource, logger: Logger, overrides?: ProviderOverrides) => ReviewProvider;

const factories = new Map<ProviderName, ProviderFactory>([
  ['ollama', (source, logger, overrides) => new OllamaProvider(resolveOllamaConfig(source, logger, overrides), logger)],
  ['openrouter', (source, logger, overrides) => new OpenRouterProvider(resolveOpenRouterConfig(source, logger, overrides), logger)],
]);

/** Narrows free text (flags, env values) to a known provider name. */
export function isProviderName(name: string): name is ProviderName {
  return listProviders().some((known) => known === name);
}

export function listProviders(): ProviderName[] {
  return Array.from(factories.keys());
}

/**
 * Resolves configuration and builds the provider. Opens its connection pool.
 * @throws ConfigurationError when required configuration is missing.
 */
export function createProvider(
  name: ProviderName,
  source: ConfigSource,
  logger: Logger,
  overrides?: ProviderOverrides
): ReviewProvider {
  const factory = factories.get(name);
  if (!factory) {
    throw new Error(`Unknown LLM provider: ${name}`);
  }
  return factory(source, logger, overrides);
}

/** Builds an architect bound to the named provider. */
export function createArchitect(
  name: ProviderName,
  source: ConfigSource,
  logger: Logger,
  overrides?: ProviderOverrides
): Architect {
  return new Architect(createProvider(name, source, logger, overrides), logger);
}

/**
 * Picks the backend from the environment: the cloud aggregator when its key is set,
 * otherwise the local inference server.
 */
export function detectProviderName(source: ConfigSource): ProviderName {
  return source.get('OPENROUTER_API_KEY')?.trim() ? 'openrouter' : 'ollama';
}
