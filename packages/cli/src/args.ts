import { ProviderName, Severity, isProviderName, listProviders } from '@architect-critic/core';

export type OutputFormat = 'markdown' | 'json';

const FORMATS: readonly OutputFormat[] = ['markdown', 'json'];
const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high'];

/**
 * CLI arguments supported by the reviewer.
 *
 * Notes:
 * - The subject comes from one of 3 places:
 *   1) File mode: --file <path>
 *   2) Git mode: --base <sha> --head <sha> (review the diff between them)
 *   3) Stdin when neither is given
 */
export interface CliArgs {
  /** File to review. */
  file?: string;

  /** Base commit SHA for Git mode. */
  base?: string;

  /** Head commit SHA for Git mode. */
  head?: string;

  /** Free-text context passed along with the subject. */
  context: string;

  /** Backend; detected from the environment when omitted. */
  provider?: ProviderName;

  /** Model id override. */
  model?: string;

  /** Base URL override. */
  baseUrl?: string;

  /** Timeout override in seconds. */
  timeout?: number;

  /** Output format for printing the critique. */
  format: OutputFormat;

  /** Exit with code 1 if the critique severity meets or exceeds this level. */
  failOn: Severity;

  /** Maximum diff size in characters (guardrail for Git mode). */
  maxDiffChars: number;

  /** Print the resolved configuration instead of reviewing. */
  showConfig: boolean;

  /** Print usage and exit. */
  help: boolean;
}

export const USAGE = [
  'Usage:',
  '  architect-critic --file <path> [options]',
  '  architect-critic --base <sha> --head <sha> [options]',
  '  cat plan.md | architect-critic [options]',
  '',
  'Options:',
  '  --context <text>',
  `  --provider ${listProviders().join('|')}`,
  '  --model <id>',
  '  --base-url <url>',
  '  --timeout <seconds>',
  '  --format markdown|json',
  '  --fail-on low|medium|high',
  '  --max-diff-chars 60000',
  '  --show-config',
  '  --help',
].join('\n');

/** Returns the allowed value equal to `value`, or fails naming the flag. */
function oneOf<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid ${flag} "${value}". Use ${allowed.join('|')}.`);
  }
  return match;
}

/**
 * Parses CLI arguments with a simple loop over the flags.
 * @param argv Arguments after the script name.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    context: '',
    format: 'markdown',
    failOn: 'high',
    maxDiffChars: 60_000, // keeps prompts for big diffs bounded
    showConfig: false,
    help: false,
  };

  const rest = [...argv];
  while (rest.length > 0) {
    const flag = rest.shift() ?? '';
    const value = (): string => {
      const next = rest.shift();
      if (next === undefined) throw new Error(`Missing value for ${flag}.`);
      return next;
    };

    if (flag === '--file') args.file = value();
    else if (flag === '--base') args.base = value();
    else if (flag === '--head') args.head = value();
    else if (flag === '--context') args.context = value();
    else if (flag === '--provider') {
      const name = value();
      if (!isProviderName(name)) {
        throw new Error(`Invalid --provider "${name}". Use ${listProviders().join('|')}.`);
      }
      args.provider = name;
    } else if (flag === '--model') args.model = value();
    else if (flag === '--base-url') args.baseUrl = value();
    else if (flag === '--timeout') args.timeout = Number(value());
    else if (flag === '--format') args.format = oneOf(flag, value(), FORMATS);
    else if (flag === '--fail-on') args.failOn = oneOf(flag, value(), SEVERITIES);
    else if (flag === '--max-diff-chars') args.maxDiffChars = Number(value());
    else if (flag === '--show-config') args.showConfig = true;
    else if (flag === '--help' || flag === '-h') args.help = true;
    else throw new Error(`Unknown option "${flag}".\n\n${USAGE}`);
  }

  // Validate timeout if provided
  if (args.timeout !== undefined && !(Number.isFinite(args.timeout) && args.timeout > 0)) {
    throw new Error(`Invalid --timeout "${args.timeout}". Must be a positive number of seconds.`);
  }

  // Validate maxDiffChars
  if (Number.isNaN(args.maxDiffChars) || args.maxDiffChars < 1_000) {
    throw new Error(`Invalid --max-diff-chars "${args.maxDiffChars}". Must be >= 1000.`);
  }

  // Validate mode: File mode, Git mode or neither (stdin)
  if (!!args.base !== !!args.head) {
    throw new Error('Git mode needs both --base and --head.');
  }
  if (args.file && args.base) {
    throw new Error('Choose either --file OR (--base and --head), not both.');
  }

  return args;
}
