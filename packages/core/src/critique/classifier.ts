import { CRITIQUE_BUCKETS, CritiqueBucket, CritiqueDocument, Severity } from '../types';

/**
 * Keyword sets per bucket. Iteration order of {@link CRITIQUE_BUCKETS} is the priority order:
 * a line matching several sets goes to the earliest one (e.g. "vulnerability" lands in critical,
 * never in security).
 */
export const BUCKET_KEYWORDS: Readonly<Record<CritiqueBucket, readonly string[]>> = {
  critical: ['critical', 'severe', 'urgent', 'vulnerability'],
  major: ['major', 'significant', 'important'],
  quality: ['quality', 'maintainability', 'readability', 'solid'],
  performance: ['performance', 'speed', 'efficiency', 'optimization'],
  security: ['security', 'vulnerability', 'injection', 'authentication'],
  recommendations: ['recommend', 'suggest', 'should', 'could'],
};

/** Classifier state: a bucket, or unset before the first keyword hit. */
export type ClassifierState = CritiqueBucket | undefined;

/**
 * Transition rule: the first bucket (in priority order) whose keywords occur in the
 * lower-cased line becomes the new state; otherwise the state is kept.
 * @param state Current state.
 * @param line Raw reply line.
 * @returns Next state.
 */
export function nextState(state: ClassifierState, line: string): ClassifierState {
  const lower = line.toLowerCase();
  for (const bucket of CRITIQUE_BUCKETS) {
    if (BUCKET_KEYWORDS[bucket].some((keyword) => lower.includes(keyword))) {
      return bucket;
    }
  }
  return state;
}

/**
 * Severity label of a document: high with critical findings, medium with major ones, else low.
 */
export function severityOf(document: Pick<CritiqueDocument, 'critical' | 'major'>): Severity {
  if (document.critical?.length) return 'high';
  if (document.major?.length) return 'medium';
  return 'low';
}

/** Default overall sentence built from the severity label. */
export function overallFor(severity: Severity): string {
  return `Code review complete. Severity level: ${severity}. See detailed feedback above.`;
}

/**
 * Fallback returned whenever classification itself fails.
 * @param error Whatever was thrown while classifying.
 */
export function parsingFailureCritique(error: unknown): CritiqueDocument {
  const detail = error instanceof Error ? error.message : String(error);
  return Object.freeze({
    critical: ['Error parsing AI response'],
    major: [detail || 'Unknown parsing error'],
    recommendations: ['Please try again or check the logs'],
    overall: 'Review failed due to parsing error',
  });
}

/**
 * Runs the state machine over every line. Action rule: a non-blank line is
 * appended (trimmed) to the current state's bucket; lines seen while the state is
 * unset are dropped.
 */
function bucketLines(text: string): Map<CritiqueBucket, string[]> {
  const buckets = new Map<CritiqueBucket, string[]>();
  let state: ClassifierState = undefined;

  for (const line of text.split('\n')) {
    state = nextState(state, line);
    const trimmed = line.trim();
    if (state === undefined || !trimmed) continue;

    const lines = buckets.get(state) ?? [];
    lines.push(trimmed);
    buckets.set(state, lines);
  }
  return buckets;
}

/**
 * Turns free-text reply into a critique document by keyword bucketing.
 *
 * Surface heuristic only: lines are attributed to the most recent bucket whose
 * keywords appeared, so a "security" mention inside a recommendation sentence
 * moves that sentence to security.
 *
 * @param text Extracted reply text.
 * @param overall Pre-existing overall summary; synthesized from severity when absent.
 * @returns A frozen critique document. Never throws.
 */
export function classifyReply(text: string, overall?: string): CritiqueDocument {
  try {
    const buckets = bucketLines(text);
    const document: { -readonly [B in CritiqueBucket]?: readonly string[] } = {};
    for (const bucket of CRITIQUE_BUCKETS) {
      const lines = buckets.get(bucket);
      if (lines?.length) document[bucket] = lines;
    }
    const summary = overall?.trim() || overallFor(severityOf(document));
    return Object.freeze({ ...document, overall: summary });
  } catch (error) {
    return parsingFailureCritique(error);
  }
}
