import { ErrorTranslator } from '../errors/errorTranslator';
import { ChatPrompt, PreflightResult, ProviderConfig } from '../types';

/**
 * Capability set the orchestrator drives. One implementation per backend;
 * the review pipeline itself lives in a single place (see Architect).
 */
export interface ReviewProvider extends ErrorTranslator {
  readonly config: ProviderConfig;
  /** Availability check run before spending a request. */
  preflight(): Promise<PreflightResult>;
  /** Submits the prompt and returns the raw, provider-shaped reply. */
  invoke(prompt: ChatPrompt): Promise<unknown>;
  /** Pulls the reply text out of the raw reply. Never throws. */
  extractText(raw: unknown): string;
  /** Releases the outbound connection. */
  close(): void;
}

/** Sampling parameters sent with every chat request. */
export const SAMPLING = { temperature: 0.7, top_p: 0.9 } as const;
