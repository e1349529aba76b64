import { CritiqueDocument, Severity, renderCritique } from '@architect-critic/core';
import { OutputFormat } from './args';

const SEVERITY_ORDER: readonly Severity[] = ['low', 'medium', 'high'];

/**
 * Returns true if the critique severity meets or exceeds the requested threshold.
 *
 * @param severity Severity label of the critique
 * @param threshold --fail-on threshold
 */
export function severityMeetsThreshold(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_ORDER.indexOf(severity) >= SEVERITY_ORDER.indexOf(threshold);
}

/**
 * Formats the critique for terminals or CI logs.
 * @param critique Critique document
 * @param format Requested output format
 */
export function formatCritique(critique: CritiqueDocument, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(critique, null, 2) : renderCritique(critique);
}
