import { InputKind } from '../types';

/**
 * Substrings that hint at source code across common syntaxes.
 */
export const CODE_INDICATORS: readonly string[] = [
  'def ', 'class ', 'function ', 'import ', 'from ',
  '{', '}', '()', '=>', 'return ', 'if ', 'for ',
  'const ', 'let ', 'var ', '<?php', 'public ', 'private ',
];

/** Number of distinct indicators found in the text. */
export function countCodeIndicators(text: string): number {
  return CODE_INDICATORS.filter((indicator) => text.includes(indicator)).length;
}

/**
 * Surface heuristic: two or more indicators means code, anything less is a plan.
 * Only selects the prompt template.
 */
export function detectInputKind(text: string): InputKind {
  return countCodeIndicators(text) >= 2 ? 'code' : 'plan';
}
