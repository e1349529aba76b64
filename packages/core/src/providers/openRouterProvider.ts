import http from 'node:http';
import { OpenAI, APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import {
  FailureCondition,
  TransportHttpError,
  TransportTimeoutError,
  TransportUnreachableError,
} from '../errors/errors';
import { oneLine, summarizeErrorBody, translateUnexpected } from '../errors/errorTranslator';
import { extractChatCompletionText } from '../extract/responseExtractor';
import { Logger } from '../logger';
import { createKeepAliveAgent } from '../transport/httpTransport';
import { ChatPrompt, CloudProviderConfig, PreflightResult, TranslatedError } from '../types';
import { ReviewProvider, SAMPLING } from './types';

/** Wire body of a chat completion request. */
export interface ChatCompletionBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  stream: false;
  temperature: number;
  top_p: number;
}

/** The slice of the OpenAI SDK this provider calls; stubbed in tests. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionBody, options?: { timeout?: number }): PromiseLike<unknown>;
}

/** Response bodies of failed calls, as received, keyed by the SDK error raised for them. */
const rawErrorBodies = new WeakMap<APIError, string>();

/**
 * SDK client that remembers the body of every non-2xx response.
 *
 * The SDK keeps only the `error` member of a JSON body on the errors it raises;
 * the body is recorded here before that happens.
 */
export class OpenRouterClient extends OpenAI {
  protected override makeStatusError(
    status: number | undefined,
    error: object | undefined,
    message: string | undefined,
    headers: Record<string, string | null | undefined> | undefined
  ): APIError {
    const statusError = super.makeStatusError(status, error, message, headers);
    // `message` holds the text of a non-JSON body; `error` the parsed JSON one.
    rawErrorBodies.set(statusError, message ?? (error !== undefined ? JSON.stringify(error) : ''));
    return statusError;
  }
}

/** Fixed causes for the status codes OpenRouter documents. */
const STATUS_CAUSES: Readonly<Record<number, (config: CloudProviderConfig) => string>> = {
  401: (config) => `Authentication failed. Check your ${config.envPrefix}_API_KEY`,
  402: () => 'Payment required. Check your OpenRouter account balance',
  404: (config) => `Model '${config.modelId}' not found. Check available models at openrouter.ai/models`,
  429: () => 'Rate limit exceeded. Please wait before trying again',
  500: () => 'OpenRouter server error. The service may be experiencing issues',
};

/**
 * Cloud aggregator (OpenRouter) reached through the OpenAI SDK, since it speaks
 * the same chat completions protocol.
 */
export class OpenRouterProvider implements ReviewProvider {
  private readonly agent: http.Agent;
  private readonly completions: ChatCompletionsApi;

  /**
   * @param config Resolved OpenRouter configuration (with API key).
   * @param logger Structured logger.
   * @param completions Chat completions API; defaults to an SDK client on the config's base URL.
   */
  constructor(
    readonly config: CloudProviderConfig,
    private readonly logger: Logger,
    completions?: ChatCompletionsApi
  ) {
    this.agent = createKeepAliveAgent(config.baseUrl);
    this.completions = completions ?? new OpenRouterClient({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      defaultHeaders: { ...config.extraHeaders },
      httpAgent: this.agent,
      // A failed call is reported, never retried.
      maxRetries: 0,
      timeout: config.timeoutSeconds * 1000,
    }).chat.completions;
  }

  /** Model availability is enforced server-side; nothing to check up front. */
  async preflight(): Promise<PreflightResult> {
    return { ok: true };
  }

  async invoke(prompt: ChatPrompt): Promise<unknown> {
    const { baseUrl, modelId, timeoutSeconds } = this.config;
    const url = `${baseUrl}/chat/completions`;
    this.logger.debug(`Calling OpenRouter at ${url}`, { modelId });

    try {
      // Non-streaming chat completion with the per-call timeout.
      return await this.completions.create(
        {
          model: modelId,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          stream: false,
          ...SAMPLING,
        },
        { timeout: timeoutSeconds * 1000 }
      );
    } catch (error) {
      // Rethrow SDK failures as transport errors.
      throw toTransportError(url, timeoutSeconds, error);
    }
  }

  extractText(raw: unknown): string {
    return extractChatCompletionText(raw, this.logger);
  }

  translateError(condition: FailureCondition): TranslatedError {
    const { baseUrl, timeoutSeconds, envPrefix } = this.config;
    switch (condition.kind) {
      case 'timeout':
        return {
          diagnostic: `Request to OpenRouter timed out after ${timeoutSeconds} seconds (model '${this.config.modelId}')`,
          remediation: [
            `Increase ${envPrefix}_TIMEOUT (current: ${timeoutSeconds}s)`,
            'Use a faster model',
            'Check your internet connection',
          ],
        };
      case 'unreachable':
        return {
          diagnostic: `Cannot connect to OpenRouter at ${baseUrl}`,
          remediation: [
            'Check your internet connection',
            `Verify ${envPrefix}_BASE_URL is correct (current: ${baseUrl})`,
            'Make sure the firewall allows HTTPS connections',
          ],
        };
      case 'http': {
        const cause = STATUS_CAUSES[condition.status];
        const detail = cause ? cause(this.config) : summarizeErrorBody(condition.body);
        return {
          diagnostic: oneLine(`OpenRouter returned an error: ${condition.status}. ${detail}`),
          remediation: [
            `Verify ${envPrefix}_API_KEY is correct`,
            'Check your OpenRouter account status',
            'Try a different model if available',
          ],
        };
      }
      case 'unexpected':
        return translateUnexpected(condition, this.config);
    }
  }

  close(): void {
    this.agent.destroy();
  }
}

/**
 * Body of a failed call as seen by an SDK error that did not come through {@link OpenRouterClient}.
 *
 * Notes:
 * - A JSON `error` member is wrapped back into `{"error": ...}` so diagnostics read the same as a raw body would.
 * - Otherwise the message is `<status> <text>` or `<status> status code (no body)`; the status prefix
 *   and the placeholder are dropped.
 */
function sdkErrorBody(error: APIError): string {
  if (error.error !== undefined) return JSON.stringify({ error: error.error });
  const text = error.message.startsWith(`${error.status} `) ? error.message.slice(`${error.status} `.length) : error.message;
  return text === 'status code (no body)' ? '' : text;
}

/**
 * Maps SDK failures onto the transport taxonomy so both providers share one error path.
 */
export function toTransportError(url: string, timeoutSeconds: number, error: unknown): unknown {
  if (error instanceof APIConnectionTimeoutError) {
    return new TransportTimeoutError(url, timeoutSeconds, { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new TransportUnreachableError(url, error.message, { cause: error });
  }
  if (error instanceof APIError && typeof error.status === 'number') {
    // Prefer the body as received; fall back to what the error itself kept.
    return new TransportHttpError(url, error.status, rawErrorBodies.get(error) ?? sdkErrorBody(error));
  }
  return error;
}
