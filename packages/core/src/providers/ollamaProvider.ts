import { FailureCondition } from '../errors/errors';
import { oneLine, summarizeErrorBody, translateUnexpected } from '../errors/errorTranslator';
import { extractOllamaText } from '../extract/responseExtractor';
import { isRecord } from '../guards';
import { Logger } from '../logger';
import { HttpTransport, Transport } from '../transport/httpTransport';
import { ChatPrompt, PreflightResult, ProviderConfig, TranslatedError } from '../types';
import { ReviewProvider, SAMPLING } from './types';

/** The model list is small; do not wait the full review timeout for it. */
export const MODEL_LIST_TIMEOUT_SECONDS = 10;

/**
 * Local inference server (Ollama) behind the chat endpoint.
 */
export class OllamaProvider implements ReviewProvider {
  /**
   * @param config Resolved Ollama configuration.
   * @param logger Structured logger.
   * @param transport JSON transport; owns the pooled connection released by close().
   */
  constructor(
    readonly config: ProviderConfig,
    private readonly logger: Logger,
    private readonly transport: Transport = new HttpTransport(config.baseUrl)
  ) { }

  /**
   * Checks the model list for the configured model. Versioned names (`model:tag`) count.
   * Any failure of the check itself means "not available".
   */
  async isModelAvailable(): Promise<boolean> {
    const { baseUrl, modelId } = this.config;
    try {
      // Ask the server which models it has pulled.
      const { body } = await this.transport.get(`${baseUrl}/api/tags`, MODEL_LIST_TIMEOUT_SECONDS);
      const names = modelNames(body);
      // Accept exact names and tagged variants.
      if (names.some((name) => name === modelId || name.startsWith(`${modelId}:`))) {
        this.logger.info(`Model '${modelId}' is available`);
        return true;
      }
      this.logger.warn(`Model '${modelId}' not found`, { available: names });
      return false;
    } catch (error) {
      this.logger.error('Failed to check model availability', { error: String(error) });
      return false;
    }
  }

  async preflight(): Promise<PreflightResult> {
    if (await this.isModelAvailable()) return { ok: true };
    // Report the missing model with the command that fixes it.
    const { modelId } = this.config;
    return {
      ok: false,
      failure: {
        diagnostic: `Model '${modelId}' is not available. Pull it with: ollama pull ${modelId}`,
        remediation: this.serviceChecklist(),
      },
    };
  }

  async invoke(prompt: ChatPrompt): Promise<unknown> {
    const { baseUrl, modelId, timeoutSeconds } = this.config;
    const url = `${baseUrl}/api/chat`;
    this.logger.debug(`Calling Ollama at ${url}`, { modelId });

    // Non-streaming chat request: one reply body per call.
    const { body } = await this.transport.post(
      url,
      {
        model: modelId,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        stream: false,
        ...SAMPLING,
      },
      timeoutSeconds,
      this.config.extraHeaders
    );
    return body;
  }

  extractText(raw: unknown): string {
    return extractOllamaText(raw, this.logger);
  }

  translateError(condition: FailureCondition): TranslatedError {
    const { baseUrl, modelId, timeoutSeconds, envPrefix } = this.config;
    switch (condition.kind) {
      case 'timeout':
        return {
          diagnostic: `Request to Ollama timed out after ${timeoutSeconds} seconds (model '${modelId}')`,
          remediation: [
            `Increase ${envPrefix}_TIMEOUT (current: ${timeoutSeconds}s)`,
            'Use a smaller or faster model',
            `Make sure the model '${modelId}' is already loaded`,
          ],
        };
      case 'unreachable':
        return {
          diagnostic: `Cannot connect to Ollama at ${baseUrl}`,
          remediation: [
            'Start Ollama: ollama serve',
            `Check ${envPrefix}_API_BASE is correct (current: ${baseUrl})`,
            'Make sure firewall and network settings allow the connection',
          ],
        };
      case 'http': {
        // 404 from the chat endpoint means the model has not been pulled.
        const detail = condition.status === 404
          ? `Model '${modelId}' not found. Pull it with: ollama pull ${modelId}`
          : summarizeErrorBody(condition.body);
        return {
          diagnostic: oneLine(`Ollama returned an error: ${condition.status}. ${detail}`),
          remediation: this.serviceChecklist(),
        };
      }
      case 'unexpected':
        return translateUnexpected(condition, this.config);
    }
  }

  close(): void {
    this.transport.close();
  }

  private serviceChecklist(): string[] {
    const { envPrefix } = this.config;
    return [
      'Check that Ollama is running (ollama list)',
      `Verify the ${envPrefix}_API_BASE environment variable`,
      `Make sure the model set in ${envPrefix}_MODEL has been pulled`,
    ];
  }
}

/** Names from a `{ models: [{ name }] }` listing; anything else yields none. */
function modelNames(body: unknown): string[] {
  if (!isRecord(body) || !Array.isArray(body.models)) return [];
  return body.models
    .map((model: unknown) => (isRecord(model) && typeof model.name === 'string' ? model.name : ''))
    .filter(Boolean);
}
