import { NO_CONTEXT_PLACEHOLDER, SYSTEM_PROMPT, buildChatPrompt, buildUserPrompt } from './prompts';

describe('buildUserPrompt', () => {
  it('uses the code template and the placeholder for blank context', () => {
    const prompt = buildUserPrompt('code', 'x = 1', '   ');

    expect(prompt.startsWith(`Review the following code critically:\n\nx = 1\n\nContext: ${NO_CONTEXT_PLACEHOLDER}\n`)).toBe(true);
  });

  it('uses the architecture template for plans', () => {
    const prompt = buildUserPrompt('plan', 'One queue per tenant', 'billing');

    expect(prompt.startsWith('Review the following architectural plan or design:\n\nOne queue per tenant\n\nContext: billing\n')).toBe(true);
  });

  it('keeps placeholders and dollar sequences inside user text literal', () => {
    const prompt = buildUserPrompt('plan', 'cost {context} $& more', 'ctx');

    expect(prompt).toContain('cost {context} $& more\n\nContext: ctx\n');
  });
});

describe('buildChatPrompt', () => {
  it('pairs the persona with the user prompt', () => {
    expect(buildChatPrompt('code', 'x', 'y')).toEqual({
      system: SYSTEM_PROMPT,
      user: buildUserPrompt('code', 'x', 'y'),
    });
  });
});
