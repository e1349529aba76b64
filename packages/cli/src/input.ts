import fs from 'node:fs/promises';
import path from 'node:path';
import simpleGit, { SimpleGit } from 'simple-git';
import { CliArgs } from './args';

/**
 * Cuts an oversized diff and marks the cut.
 * @param diff Unified diff text.
 * @param maxDiffChars Size limit in characters.
 */
export function clampDiff(diff: string, maxDiffChars: number): string {
  if (diff.length <= maxDiffChars) return diff;
  return `${diff.slice(0, maxDiffChars)}\n... [diff truncated to ${maxDiffChars} chars]\n`;
}

/**
 * Collects the unified diff between two commits.
 *
 * @param base Base commit SHA
 * @param head Head commit SHA
 * @param maxDiffChars Size limit applied to the whole diff
 * @param git Git client (the current working directory by default)
 */
export async function collectDiff(
  base: string,
  head: string,
  maxDiffChars: number,
  git: Pick<SimpleGit, 'diff'> = simpleGit()
): Promise<string> {
  const diff = await git.diff([`${base}..${head}`]);
  if (!diff.trim()) {
    throw new Error(`No changes between ${base} and ${head}.`);
  }
  return clampDiff(diff, maxDiffChars);
}

/** Reads a whole text stream. */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks.join('');
}

/**
 * Loads the text to review: the file, the git diff, or stdin.
 *
 * @param args Parsed CLI args
 * @param stdin Fallback input stream
 */
export async function readSubject(
  args: Pick<CliArgs, 'file' | 'base' | 'head' | 'maxDiffChars'>,
  stdin: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin
): Promise<string> {
  let subject: string;
  if (args.file) {
    subject = await fs.readFile(path.resolve(process.cwd(), args.file), 'utf-8');
  } else if (args.base && args.head) {
    subject = await collectDiff(args.base, args.head, args.maxDiffChars);
  } else {
    // An interactive terminal means nothing was piped in.
    if (stdin.isTTY) throw new Error('Nothing to review: pass --file, --base/--head or pipe text on stdin.');
    subject = await readStream(stdin);
  }

  if (!subject.trim()) {
    throw new Error('Nothing to review: the input is empty.');
  }
  return subject;
}
