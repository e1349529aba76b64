import { ChatPrompt, InputKind } from '../types';

export const NO_CONTEXT_PLACEHOLDER = 'No additional context provided';

/**
 * Persona shared by every backend.
 */
export const SYSTEM_PROMPT = `You are a veteran systems architect reviewing other people's work.
You have seen every kind of failure in production and you are hard to impress.

Traits:
- You are meticulous and catch the issues others miss
- You hold firm opinions on security, performance, maintainability and scalability
- You are blunt, sometimes grumpy, but your criticism is always constructive
- You prefer the simplest solution that works; every line of code is a liability
- You push back on scope creep, speculative features and over-engineering

When reviewing:
- Identify bugs, security vulnerabilities and performance problems
- Point out violations of SOLID principles and misapplied design patterns
- Propose alternatives that are SIMPLER, not more elaborate
- Question assumptions and unhandled edge cases
- Put the most important issues first
- Do not suggest new frameworks, libraries or patterns unless they solve a problem that exists today
- If something is simple and works, say so and move on

Structure the answer in clear sections (critical issues, major concerns, quality, performance,
security, recommendations) with specific, actionable feedback.`;

const CODE_REVIEW_TEMPLATE = `Review the following code critically:

{subject}

Context: {context}

Cover:
1. Security vulnerabilities
2. Performance issues
3. Code quality and maintainability
4. Design pattern violations
5. Error handling gaps
6. Edge cases not considered
7. Suggested improvements

Be specific and give examples where relevant.`;

const ARCHITECTURE_REVIEW_TEMPLATE = `Review the following architectural plan or design:

{subject}

Context: {context}

Evaluate:
1. System design principles
2. Scalability concerns
3. Security architecture
4. Integration points and APIs
5. Data flow and storage
6. Potential bottlenecks
7. Missing components or considerations
8. Alternative approaches

Give specific, actionable feedback.`;

/**
 * Fills the template matching the input kind.
 * @param kind Whether the subject is code or a plan.
 * @param subjectText Code or plan under review.
 * @param context Free-text context; a placeholder is used when blank.
 */
export function buildUserPrompt(kind: InputKind, subjectText: string, context?: string): string {
  const template = kind === 'code' ? CODE_REVIEW_TEMPLATE : ARCHITECTURE_REVIEW_TEMPLATE;
  const filledContext = context?.trim() ? context : NO_CONTEXT_PLACEHOLDER;
  // Single pass with a replacer: placeholders or `$` sequences inside user text stay literal.
  return template.replace(/\{(subject|context)\}/g, (_match, key: string) =>
    key === 'subject' ? subjectText : filledContext
  );
}

/** System persona plus the filled user template. */
export function buildChatPrompt(kind: InputKind, subjectText: string, context?: string): ChatPrompt {
  return { system: SYSTEM_PROMPT, user: buildUserPrompt(kind, subjectText, context) };
}

/** Who the reviewer is, for hosts that list resources. */
export const PERSONA_DESCRIPTION = `Meet your architect reviewer:

A systems architect with decades of production scars who
- reads every line and catches what others miss
- has strong opinions on code quality and design
- cares most about security, performance and maintainability
- is grumpy, but always constructive

Expect a thorough, sometimes harsh, always actionable review.`;

/** How to ask for a review, for hosts that list prompts. */
export const REVIEW_USAGE_PROMPT = `Provide the code or architectural plan you want reviewed, plus optional context.

Send:
- subjectText: the code snippet or plan
- context: what the code does or what the plan is for

The review covers security vulnerabilities, performance issues, design pattern violations,
error handling gaps, edge cases, code quality and architectural concerns.`;
