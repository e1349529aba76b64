import { isRecord, tryParseJson } from '../guards';
import { CritiqueDocument, ProviderConfig, TranslatedError } from '../types';
import { FailureCondition } from './errors';

/** Provider-specific mapping of failure conditions to remediation text. */
export interface ErrorTranslator {
  translateError(condition: FailureCondition): TranslatedError;
}

/** How much of an unrecognized error body is surfaced. */
export const ERROR_BODY_PREVIEW_CHARS = 200;

export const CONNECTION_REQUIRED_NOTE = 'Cannot perform a review without a working LLM connection';
export const CONNECTION_FAILED_OVERALL = 'Review failed - fix the connection and try again';

/**
 * Collapses whitespace so a diagnostic stays on one line.
 * @param text Text that may contain newlines.
 */
export function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Shortens a raw error body for display.
 *
 * A JSON body shaped like `{"error": {...}}` is unwrapped first: `error.message`
 * when present, otherwise the whole error value. The result is cut to the
 * first {@link ERROR_BODY_PREVIEW_CHARS} characters.
 * @param body Raw response body.
 */
export function summarizeErrorBody(body: string): string {
  let summary = body;
  const parsed = tryParseJson(body);
  if (isRecord(parsed) && 'error' in parsed) {
    const details = parsed.error;
    if (isRecord(details) && typeof details.message === 'string') summary = details.message;
    else summary = typeof details === 'string' ? details : JSON.stringify(details) ?? '';
  }
  // The unwrapped message is capped as well.
  return oneLine(summary.slice(0, ERROR_BODY_PREVIEW_CHARS));
}

/**
 * Generic translation for exceptions nobody anticipated.
 * @param condition The unexpected failure.
 * @param config Owning provider configuration.
 */
export function translateUnexpected(
  condition: Extract<FailureCondition, { kind: 'unexpected' }>,
  config: ProviderConfig
): TranslatedError {
  return {
    diagnostic: oneLine(`An unexpected error occurred: ${condition.typeName}: ${condition.message}`),
    remediation: [
      'Check the logs for more details',
      `Ensure ${config.displayName} is properly configured (base URL ${config.baseUrl}, model '${config.modelId}')`,
      'Restart the reviewer',
    ],
  };
}

/**
 * Renders a translated failure in the same shape as a successful review,
 * so callers never special-case errors.
 * @param error The translated failure.
 * @returns A frozen critique document.
 */
export function errorCritique(error: TranslatedError): CritiqueDocument {
  return Object.freeze({
    critical: [error.diagnostic],
    major: [CONNECTION_REQUIRED_NOTE],
    recommendations: [...error.remediation],
    overall: CONNECTION_FAILED_OVERALL,
  });
}
