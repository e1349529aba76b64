import { CritiqueBucket, CritiqueDocument } from '../types';

/** Heading and fallback sentence of each section, in display order. */
const SECTIONS: ReadonlyArray<{ bucket: CritiqueBucket; heading: string; whenEmpty: string }> = [
  { bucket: 'critical', heading: 'Critical Issues', whenEmpty: 'No critical issues found.' },
  { bucket: 'major', heading: 'Major Concerns', whenEmpty: 'No major concerns.' },
  { bucket: 'quality', heading: 'Code Quality', whenEmpty: 'Nothing notable about code quality.' },
  { bucket: 'performance', heading: 'Performance', whenEmpty: 'Performance seems acceptable.' },
  { bucket: 'security', heading: 'Security', whenEmpty: 'No obvious security problems.' },
  { bucket: 'recommendations', heading: 'Recommendations', whenEmpty: 'Keep it simple and stick to the requirements.' },
];

export const BULLET = '•';

/** Joins bucket lines into a bullet list. */
export function toBullets(lines: readonly string[]): string {
  return lines.map((line) => `${BULLET} ${line}`).join('\n');
}

/**
 * Renders a critique document as markdown: one section per bucket, then the overall assessment.
 * @param document The critique to render.
 * @param title Heading of the whole review.
 */
export function renderCritique(document: CritiqueDocument, title = 'ARCHITECT REVIEW'): string {
  const parts = [`# ${title}`, ''];
  for (const { bucket, heading, whenEmpty } of SECTIONS) {
    const lines = document[bucket];
    parts.push(`## ${heading}`, lines?.length ? toBullets(lines) : whenEmpty, '');
  }
  parts.push('## Overall Assessment', document.overall);
  return parts.join('\n');
}
