#!/usr/bin/env node
import {
  ProviderOverrides,
  createArchitect,
  createLogger,
  describeConfig,
  detectProviderName,
  envConfigSource,
  severityOf,
  withArchitect,
} from '@architect-critic/core';
import { CliArgs, USAGE, parseArgs } from './args';
import { readSubject } from './input';
import { formatCritique, severityMeetsThreshold } from './report';

/** Flags that take precedence over the environment. */
function toOverrides(args: CliArgs): ProviderOverrides {
  return { baseUrl: args.baseUrl, modelId: args.model, timeoutSeconds: args.timeout };
}

/**
 * CLI entry point:
 * - Parse args
 * - Read the subject (file, git diff or stdin)
 * - Bind an architect to the chosen backend
 * - Review and print
 * - Set exit code based on --fail-on
 */
async function main(): Promise<void> {
  // Parse and validate flags.
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  // Logs go to stderr; keep them quiet unless asked for.
  const logger = createLogger({ level: process.env.LOG_LEVEL ?? 'warn', service: 'architect-critic-cli' });
  // Read configuration from the environment and pick the backend.
  const source = envConfigSource();
  const providerName = args.provider ?? detectProviderName(source);

  // Read input before opening a connection.
  const subject = args.showConfig ? '' : await readSubject(args);
  // Bind an architect; configuration errors surface here.
  const architect = createArchitect(providerName, source, logger, toOverrides(args));

  await withArchitect(architect, async (reviewer) => {
    if (args.showConfig) {
      console.log(describeConfig(reviewer.provider.config));
      return;
    }

    // Run the review.
    const critique = await reviewer.review(subject, args.context);
    // Print in requested format.
    console.log(formatCritique(critique, args.format));

    // Set exit code based on severity threshold.
    if (severityMeetsThreshold(severityOf(critique), args.failOn)) {
      process.exitCode = 1;
    }
  });
}

/**
 * Run the CLI main function and handle uncaught errors.
 */
main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
