import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { staticConfigSource } from '../config/configSource';
import { resolveOpenRouterConfig } from '../config/providerConfig';
import {
  FailureCondition,
  TransportHttpError,
  TransportTimeoutError,
  TransportUnreachableError,
} from '../errors/errors';
import { errorCritique } from '../errors/errorTranslator';
import { createLogger } from '../logger';
import { ChatCompletionBody, OpenRouterClient, OpenRouterProvider, toTransportError } from './openRouterProvider';

describe('OpenRouterProvider', () => {
  const logger = createLogger({ silent: true });
  const config = resolveOpenRouterConfig(staticConfigSource({ OPENROUTER_API_KEY: 'test-key' }), logger);
  let create: jest.Mock<Promise<unknown>, [ChatCompletionBody, { timeout?: number }?]>;
  let provider: OpenRouterProvider;

  beforeEach(() => {
    create = jest.fn<Promise<unknown>, [ChatCompletionBody, { timeout?: number }?]>();
    provider = new OpenRouterProvider(config, logger, { create });
  });

  afterEach(() => {
    provider.close();
  });

  it('needs no pre-flight check', async () => {
    await expect(provider.preflight()).resolves.toEqual({ ok: true });
  });

  it('sends a chat completion with the configured timeout', async () => {
    const reply = { choices: [{ message: { content: 'Major: too many layers' } }] };
    create.mockResolvedValue(reply);

    const raw = await provider.invoke({ system: 'persona', user: 'review this' });

    expect(raw).toBe(reply);
    expect(provider.extractText(raw)).toBe('Major: too many layers');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'openai/gpt-3.5-turbo',
        messages: [
          { role: 'system', content: 'persona' },
          { role: 'user', content: 'review this' },
        ],
        stream: false,
        temperature: 0.7,
        top_p: 0.9,
      },
      { timeout: 60000 }
    );
  });

  it('rethrows SDK timeouts as transport timeouts', async () => {
    create.mockRejectedValue(new APIConnectionTimeoutError());

    await expect(provider.invoke({ system: 's', user: 'u' })).rejects.toBeInstanceOf(TransportTimeoutError);
  });

  describe('translateError', () => {
    it('blames the API key for a 401 whatever the body says', () => {
      expect(provider.translateError({ kind: 'http', status: 401, body: '{"error":{"message":"No auth"}}' }).diagnostic).toBe(
        'OpenRouter returned an error: 401. Authentication failed. Check your OPENROUTER_API_KEY'
      );
    });

    it.each([
      [402, 'OpenRouter returned an error: 402. Payment required. Check your OpenRouter account balance'],
      [404, "OpenRouter returned an error: 404. Model 'openai/gpt-3.5-turbo' not found. Check available models at openrouter.ai/models"],
      [429, 'OpenRouter returned an error: 429. Rate limit exceeded. Please wait before trying again'],
      [500, 'OpenRouter returned an error: 500. OpenRouter server error. The service may be experiencing issues'],
    ])('has a fixed cause for %i', (status, diagnostic) => {
      expect(provider.translateError({ kind: 'http', status, body: '' }).diagnostic).toBe(diagnostic);
    });

    it('unwraps the body of other status codes', () => {
      expect(provider.translateError({ kind: 'http', status: 418, body: '{"error":{"message":"I am a teapot"}}' }).diagnostic).toBe(
        'OpenRouter returned an error: 418. I am a teapot'
      );
      expect(provider.translateError({ kind: 'http', status: 503, body: 'Service Unavailable' }).diagnostic).toBe(
        'OpenRouter returned an error: 503. Service Unavailable'
      );
    });

    it('points at the base URL when unreachable', () => {
      expect(provider.translateError({ kind: 'unreachable' }).remediation[1]).toBe(
        'Verify OPENROUTER_BASE_URL is correct (current: https://openrouter.ai/api/v1)'
      );
    });

    it.each<FailureCondition>([
      { kind: 'timeout' },
      { kind: 'unreachable' },
      { kind: 'http', status: 400, body: '' },
      { kind: 'unexpected', typeName: 'Error', message: 'boom' },
    ])('yields a non-empty critique for $kind', (condition) => {
      const critique = errorCritique(provider.translateError(condition));

      expect(critique.critical?.length).toBeGreaterThan(0);
      expect(critique.recommendations?.length).toBeGreaterThan(0);
    });
  });
});

describe('toTransportError', () => {
  const url = 'https://openrouter.ai/api/v1/chat/completions';

  it('maps connection errors to unreachable', () => {
    expect(toTransportError(url, 60, new APIConnectionError({ message: 'connect ECONNREFUSED' }))).toBeInstanceOf(
      TransportUnreachableError
    );
  });

  it('wraps the SDK error member back into a JSON body', () => {
    const mapped = toTransportError(url, 60, new APIError(503, { message: 'Upstream down' }, undefined, undefined));

    expect(mapped).toBeInstanceOf(TransportHttpError);
    expect(mapped).toMatchObject({ status: 503, body: '{"error":{"message":"Upstream down"}}' });
  });

  it('drops the status prefix the SDK puts before a plain-text body', () => {
    const mapped = toTransportError(url, 60, APIError.generate(503, undefined, 'Service Unavailable', {}));

    expect(mapped).toMatchObject({ status: 503, body: 'Service Unavailable' });
  });

  it('treats the SDK placeholder for a missing error member as an empty body', () => {
    const mapped = toTransportError(url, 60, APIError.generate(418, { detail: 'teapot says no' }, undefined, {}));

    expect(mapped).toMatchObject({ status: 418, body: '' });
  });

  it('keeps the error member of a generated status error', () => {
    const mapped = toTransportError(url, 60, APIError.generate(400, { error: { message: 'Invalid model' } }, undefined, {}));

    expect(mapped).toMatchObject({ status: 400, body: '{"error":{"message":"Invalid model"}}' });
  });

  it('passes unknown errors through', () => {
    const failure = new RangeError('nope');

    expect(toTransportError(url, 60, failure)).toBe(failure);
  });
});

describe('OpenRouterClient', () => {
  class InspectableClient extends OpenRouterClient {
    statusError(status: number, body: object | undefined, text: string | undefined): APIError {
      return this.makeStatusError(status, body, text, {});
    }
  }

  const logger = createLogger({ silent: true });
  const config = resolveOpenRouterConfig(staticConfigSource({ OPENROUTER_API_KEY: 'test-key' }), logger);
  const client = new InspectableClient({ apiKey: 'test-key', baseURL: config.baseUrl, maxRetries: 0 });
  const provider = new OpenRouterProvider(config, logger, { create: jest.fn() });
  const url = `${config.baseUrl}/chat/completions`;

  afterAll(() => {
    provider.close();
  });

  /** Diagnostic for a status error raised by the client. */
  function diagnosticFor(statusError: APIError): string {
    const mapped = toTransportError(url, 60, statusError);
    if (!(mapped instanceof TransportHttpError)) throw new Error('expected an HTTP error');
    return provider.translateError({ kind: 'http', status: mapped.status, body: mapped.body }).diagnostic;
  }

  it('keeps a JSON body without an error member', () => {
    expect(diagnosticFor(client.statusError(418, { detail: 'teapot says no' }, undefined))).toBe(
      'OpenRouter returned an error: 418. {"detail":"teapot says no"}'
    );
  });

  it('keeps a plain-text body without the status prefix', () => {
    expect(diagnosticFor(client.statusError(503, undefined, 'Service Unavailable'))).toBe(
      'OpenRouter returned an error: 503. Service Unavailable'
    );
  });

  it('unwraps the message of an error member', () => {
    expect(diagnosticFor(client.statusError(400, { error: { message: 'Invalid model' } }, undefined))).toBe(
      'OpenRouter returned an error: 400. Invalid model'
    );
  });
});
