import { encode } from 'gpt-tokenizer';
import { classifyReply } from './critique/classifier';
import { renderCritique } from './critique/render';
import { describeFailure } from './errors/errors';
import { errorCritique } from './errors/errorTranslator';
import { Logger } from './logger';
import { detectInputKind } from './prompts/inputKind';
import { buildChatPrompt } from './prompts/prompts';
import { ReviewProvider } from './providers/types';
import { ChatPrompt, CritiqueDocument, ReviewRequest } from './types';

/**
 * Evaluates whether the prompt exceeds the provider's token ceiling.
 * @param prompt The prompt about to be sent.
 * @param maxInputTokens Ceiling; no ceiling means it cannot be exceeded.
 * @returns The token count when over the limit, otherwise undefined.
 */
function exceededTokenCount(prompt: ChatPrompt, maxInputTokens?: number): number | undefined {
  // If no ceiling is set, it cannot be exceeded.
  if (!maxInputTokens) return undefined;
  // Count system and user text together.
  const tokenCount = encode(`${prompt.system}\n${prompt.user}`).length;
  return tokenCount > maxInputTokens ? tokenCount : undefined;
}

/**
 * The review pipeline shared by every provider:
 * pre-flight → input-kind heuristic → prompt → backend call → extraction → classification.
 *
 * Every failure ends up as a critique document;
 * nothing is thrown to the caller.
 *
 * @param provider Backend capabilities.
 * @param request Subject and optional context.
 * @param logger Structured logger.
 * @returns The critique document.
 */
export async function runReview(
  provider: ReviewProvider,
  request: ReviewRequest,
  logger: Logger
): Promise<CritiqueDocument> {
  const { config } = provider;
  try {
    // Step 1: availability check before spending a request.
    const preflight = await provider.preflight();
    if (!preflight.ok) {
      logger.warn('Pre-flight check failed', { provider: config.providerName, diagnostic: preflight.failure.diagnostic });
      return errorCritique(preflight.failure);
    }

    // Step 2: the input kind only selects the template.
    const kind = detectInputKind(request.subjectText);
    logger.info(`Reviewing ${kind}`, { provider: config.providerName, model: config.modelId });

    // Step 3: prompt, size guard, backend call.
    const prompt = buildChatPrompt(kind, request.subjectText, request.context);
    // Refuse prompts the model cannot take before spending a request.
    const tokenCount = exceededTokenCount(prompt, config.maxInputTokens);
    if (tokenCount !== undefined) {
      logger.warn('Prompt exceeds the token limit', { tokenCount, maxInputTokens: config.maxInputTokens });
      return errorCritique({
        diagnostic: `Input too large: ${tokenCount} tokens exceeds the limit of ${config.maxInputTokens} for model '${config.modelId}'`,
        remediation: [
          'Split the code or plan into smaller parts',
          `Raise ${config.envPrefix}_MAX_INPUT_TOKENS if the model accepts longer prompts`,
        ],
      });
    }
    // Call the backend.
    const raw = await provider.invoke(prompt);

    // Step 4: extraction and classification never throw.
    const text = provider.extractText(raw);
    return classifyReply(text);
  } catch (error) {
    // Classify the failure, log it, then explain it in the provider's terms.
    const condition = describeFailure(error);
    logger.error(`Review failed: ${condition.kind}`, {
      provider: config.providerName,
      baseUrl: config.baseUrl,
      error: error instanceof Error ? error.message : String(error),
    });
    return errorCritique(provider.translateError(condition));
  }
}

/**
 * One reviewer bound to one backend.
 *
 * Owns the provider's outbound connection from construction until close().
 * Safe for sequential reuse; callers wanting parallel reviews should use separate instances.
 */
export class Architect {
  private closed = false;

  constructor(readonly provider: ReviewProvider, private readonly logger: Logger) { }

  /** Reviews code or an architectural plan. Never throws. */
  async review(subjectText: string, context = ''): Promise<CritiqueDocument> {
    return runReview(this.provider, { subjectText, context }, this.logger);
  }

  /** Reviews and renders the critique as markdown. */
  async reviewAsText(subjectText: string, context = ''): Promise<string> {
    return renderCritique(await this.review(subjectText, context));
  }

  /** Releases the connection. Further calls are no-ops. */
  close(): void {
    // Already closed: nothing to release.
    if (this.closed) return;
    this.closed = true;
    this.provider.close();
  }
}

/**
 * Scoped acquisition: runs `fn` with the architect and always closes it afterwards.
 * @param architect The architect to lend out.
 * @param fn Work to run.
 */
export async function withArchitect<T>(architect: Architect, fn: (architect: Architect) => Promise<T>): Promise<T> {
  try {
    return await fn(architect);
  } finally {
    architect.close();
  }
}
