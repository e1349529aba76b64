import { staticConfigSource } from '../config/configSource';
import { resolveOllamaConfig } from '../config/providerConfig';
import { FailureCondition } from '../errors/errors';
import { errorCritique } from '../errors/errorTranslator';
import { createLogger } from '../logger';
import { Transport, TransportResponse } from '../transport/httpTransport';
import { OllamaProvider } from './ollamaProvider';

function stubTransport(): jest.Mocked<Transport> {
  return {
    get: jest.fn<Promise<TransportResponse>, [string, number]>(),
    post: jest.fn<Promise<TransportResponse>, [string, unknown, number, Readonly<Record<string, string>>?]>(),
    close: jest.fn<void, []>(),
  };
}

describe('OllamaProvider', () => {
  const logger = createLogger({ silent: true });
  const config = resolveOllamaConfig(staticConfigSource({}), logger);
  let transport: jest.Mocked<Transport>;
  let provider: OllamaProvider;

  beforeEach(() => {
    transport = stubTransport();
    provider = new OllamaProvider(config, logger, transport);
  });

  describe('isModelAvailable', () => {
    it('accepts a tagged variant of the configured model', async () => {
      transport.get.mockResolvedValue({ status: 200, body: { models: [{ name: 'mistral' }, { name: 'llama3.2:latest' }] } });

      await expect(provider.isModelAvailable()).resolves.toBe(true);
      expect(transport.get).toHaveBeenCalledWith('http://localhost:11434/api/tags', 10);
    });

    it('does not accept a model that only shares a prefix', async () => {
      transport.get.mockResolvedValue({ status: 200, body: { models: [{ name: 'llama3.2-vision:latest' }] } });

      await expect(provider.isModelAvailable()).resolves.toBe(false);
    });

    it('reports unavailable when the listing fails', async () => {
      transport.get.mockRejectedValue(new Error('socket hang up'));

      await expect(provider.isModelAvailable()).resolves.toBe(false);
    });
  });

  it('fails the pre-flight check with a pull hint', async () => {
    transport.get.mockResolvedValue({ status: 200, body: { models: [] } });

    const result = await provider.preflight();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.diagnostic).toBe("Model 'llama3.2' is not available. Pull it with: ollama pull llama3.2");
    }
  });

  it('posts a non-streaming chat request with both messages', async () => {
    transport.post.mockResolvedValue({ status: 200, body: { message: { content: 'ok' } } });

    const raw = await provider.invoke({ system: 'persona', user: 'review this' });

    expect(raw).toEqual({ message: { content: 'ok' } });
    expect(transport.post).toHaveBeenCalledWith(
      'http://localhost:11434/api/chat',
      {
        model: 'llama3.2',
        messages: [
          { role: 'system', content: 'persona' },
          { role: 'user', content: 'review this' },
        ],
        stream: false,
        temperature: 0.7,
        top_p: 0.9,
      },
      300,
      {}
    );
  });

  describe('translateError', () => {
    it('explains a 404 as a missing model', () => {
      expect(provider.translateError({ kind: 'http', status: 404, body: '{"error":"model not found"}' }).diagnostic).toBe(
        "Ollama returned an error: 404. Model 'llama3.2' not found. Pull it with: ollama pull llama3.2"
      );
    });

    it('summarizes other error bodies', () => {
      expect(provider.translateError({ kind: 'http', status: 500, body: 'model runner\ncrashed' }).diagnostic).toBe(
        'Ollama returned an error: 500. model runner crashed'
      );
    });

    it('keeps a long error message to the preview length', () => {
      const body = JSON.stringify({ error: 'x'.repeat(5000) });

      expect(provider.translateError({ kind: 'http', status: 500, body }).diagnostic).toBe(
        `Ollama returned an error: 500. ${'x'.repeat(200)}`
      );
    });

    it('names the timeout variable and current value', () => {
      const translated = provider.translateError({ kind: 'timeout' });

      expect(translated.diagnostic).toBe("Request to Ollama timed out after 300 seconds (model 'llama3.2')");
      expect(translated.remediation[0]).toBe('Increase OLLAMA_TIMEOUT (current: 300s)');
    });

    it('tells the user to start the server when unreachable', () => {
      const translated = provider.translateError({ kind: 'unreachable' });

      expect(translated.diagnostic).toBe('Cannot connect to Ollama at http://localhost:11434');
      expect(translated.remediation[0]).toBe('Start Ollama: ollama serve');
    });

    it.each<FailureCondition>([
      { kind: 'timeout' },
      { kind: 'unreachable' },
      { kind: 'http', status: 502, body: '' },
      { kind: 'unexpected', typeName: 'RangeError', message: 'out of range' },
    ])('yields a non-empty critique for $kind', (condition) => {
      const critique = errorCritique(provider.translateError(condition));

      expect(critique.critical?.length).toBeGreaterThan(0);
      expect(critique.recommendations?.length).toBeGreaterThan(0);
    });
  });

  it('releases the transport on close', () => {
    provider.close();

    expect(transport.close).toHaveBeenCalledTimes(1);
  });
});
