/**
 * Backends a reviewer can be bound to. Kept narrow so the registry can map cleanly.
 */
export type ProviderName = 'ollama' | 'openrouter';

/** Whether the text under review reads like source code or like a design/plan. */
export type InputKind = 'code' | 'plan';

/** Overall severity label derived from a critique. */
export type Severity = 'low' | 'medium' | 'high';

/**
 * Input to one review cycle. Created per call and never persisted.
 */
export interface ReviewRequest {
  subjectText: string;
  context?: string;
}

/**
 * Connection parameters for one backend, resolved once and read-only afterwards.
 */
export interface ProviderConfig {
  readonly providerName: ProviderName;
  /** Human-facing backend name used in diagnostics (e.g. "Ollama"). */
  readonly displayName: string;
  /** Prefix of the environment variables this config was resolved from. */
  readonly envPrefix: string;
  readonly baseUrl: string;
  readonly modelId: string;
  readonly timeoutSeconds: number;
  readonly extraHeaders: Readonly<Record<string, string>>;
  /** Optional prompt-size ceiling, counted in model tokens. */
  readonly maxInputTokens?: number;
}

/** Cloud backends additionally carry a credential. */
export interface CloudProviderConfig extends ProviderConfig {
  readonly apiKey: string;
}

/**
 * The six critique sections, in classifier priority order.
 */
export const CRITIQUE_BUCKETS = [
  'critical',
  'major',
  'quality',
  'performance',
  'security',
  'recommendations',
] as const;

export type CritiqueBucket = (typeof CRITIQUE_BUCKETS)[number];

/**
 * Canonical output of every review path (success, parse failure, network failure).
 *
 * Each bucket is either absent or a non-empty list of lines in the order they
 * were found. `overall` is always populated.
 */
export type CritiqueDocument = {
  readonly [B in CritiqueBucket]?: readonly string[];
} & {
  readonly overall: string;
};

/** A failure turned into something a reader can act on. */
export interface TranslatedError {
  /** One line naming the failure kind and the offending endpoint/model. */
  diagnostic: string;
  /** Ordered remediation steps. */
  remediation: string[];
}

/** Outcome of a provider's availability check. */
export type PreflightResult = { ok: true } | { ok: false; failure: TranslatedError };

/** System + user instruction pair submitted to a backend. */
export interface ChatPrompt {
  system: string;
  user: string;
}
