import { isRecord } from '../guards';
import { Logger } from '../logger';

/** Pulls the reply text out of a provider-specific payload. */
export type ResponseExtractor = (raw: unknown, logger: Logger) => string;

/**
 * String form of a payload whose shape nobody expected. Flags the mismatch in the log.
 * @param provider Provider label for the log entry.
 */
function unexpectedShape(provider: string, raw: unknown, logger: Logger): string {
  const keys = isRecord(raw) ? Object.keys(raw) : [];
  logger.warn(`Unexpected ${provider} response format`, { keys });
  if (typeof raw === 'string') return raw;
  return JSON.stringify(raw) ?? String(raw);
}

/**
 * Local inference chat reply.
 *
 * Tries `message.content`, then `response` (generate-style replies), then `content`.
 */
export const extractOllamaText: ResponseExtractor = (raw, logger) => {
  if (isRecord(raw)) {
    const message = raw.message;
    if (isRecord(message) && typeof message.content === 'string') return message.content;
    if (typeof raw.response === 'string') return raw.response;
    if (typeof raw.content === 'string') return raw.content;
  }
  return unexpectedShape('Ollama', raw, logger);
};

/**
 * OpenAI-compatible chat completion: `choices[0].message.content`.
 */
export const extractChatCompletionText: ResponseExtractor = (raw, logger) => {
  if (isRecord(raw) && Array.isArray(raw.choices) && raw.choices.length > 0) {
    const choice: unknown = raw.choices[0];
    if (isRecord(choice) && isRecord(choice.message) && typeof choice.message.content === 'string') {
      return choice.message.content;
    }
  }
  return unexpectedShape('OpenRouter', raw, logger);
};
