import { parseArgs } from './args';

describe('parseArgs', () => {
  it('applies defaults for stdin mode', () => {
    expect(parseArgs([])).toEqual({
      context: '',
      format: 'markdown',
      failOn: 'high',
      maxDiffChars: 60_000,
      showConfig: false,
      help: false,
    });
  });

  it('reads every option', () => {
    const args = parseArgs([
      '--file', 'plan.md',
      '--context', 'payments team',
      '--provider', 'openrouter',
      '--model', 'anthropic/claude-3-haiku',
      '--base-url', 'http://localhost:8080/v1',
      '--timeout', '45',
      '--format', 'json',
      '--fail-on', 'medium',
    ]);

    expect(args).toMatchObject({
      file: 'plan.md',
      context: 'payments team',
      provider: 'openrouter',
      model: 'anthropic/claude-3-haiku',
      baseUrl: 'http://localhost:8080/v1',
      timeout: 45,
      format: 'json',
      failOn: 'medium',
    });
  });

  it('accepts git mode', () => {
    expect(parseArgs(['--base', 'abc', '--head', 'def', '--max-diff-chars', '5000'])).toMatchObject({
      base: 'abc',
      head: 'def',
      maxDiffChars: 5000,
    });
  });

  it('rejects half of git mode', () => {
    expect(() => parseArgs(['--base', 'abc'])).toThrow('Git mode needs both --base and --head.');
  });

  it('rejects file and git mode together', () => {
    expect(() => parseArgs(['--file', 'a.ts', '--base', 'abc', '--head', 'def'])).toThrow(
      'Choose either --file OR (--base and --head), not both.'
    );
  });

  it('rejects unknown providers, formats and thresholds', () => {
    expect(() => parseArgs(['--provider', 'gemini'])).toThrow('Invalid --provider "gemini". Use ollama|openrouter.');
    expect(() => parseArgs(['--format', 'html'])).toThrow('Invalid --format "html". Use markdown|json.');
    expect(() => parseArgs(['--fail-on', 'critical'])).toThrow('Invalid --fail-on "critical". Use low|medium|high.');
  });

  it('rejects bad numbers', () => {
    expect(() => parseArgs(['--timeout', '0'])).toThrow('Invalid --timeout "0". Must be a positive number of seconds.');
    expect(() => parseArgs(['--max-diff-chars', '10'])).toThrow('Invalid --max-diff-chars "10". Must be >= 1000.');
  });

  it('reports a flag without its value', () => {
    expect(() => parseArgs(['--model'])).toThrow('Missing value for --model.');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option "--verbose".');
  });
});
