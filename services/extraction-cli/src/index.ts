#!/usr/bin/env node
/**
 * Extraction CLI
 *
 * stream  - prints each email's extraction live, token by token
 * batch   - extracts all emails in parallel and prints ordered results
 * measure - sequential vs. batch timing sweep, written to a report file
 */

import {
  config,
  logger,
  errorMessage,
  createExtractionRuntime,
  createExtractionRequest,
  loadEmailsFromFile,
  splitEmails,
  measureTimes,
  renderResult,
  type ExtractionRuntime,
} from '@inbox-entities/shared';
import { parseCliArgs, type CliOptions } from './args';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function loadEmails(options: CliOptions): Promise<string[]> {
  if (options.file) {
    return loadEmailsFromFile(options.file);
  }
  if (options.mode === 'stream') {
    return splitEmails(await readStdin());
  }
  return loadEmailsFromFile(config.emailsFile);
}

async function runStream(runtime: ExtractionRuntime, emails: string[], options: CliOptions) {
  for (const [i, text] of emails.entries()) {
    process.stdout.write(`Email #${i + 1}\n`);

    const fragments = runtime.session.stream(createExtractionRequest(text, options.entityTypes), {
      onRetry: (notice) => {
        process.stdout.write(
          `\n[attempt ${notice.attempt} failed: ${errorMessage(notice.error)}; retrying in ${notice.delayMs}ms]\n`
        );
      },
    });

    for await (const fragment of fragments) {
      process.stdout.write(fragment);
    }
    process.stdout.write('\n\n');
  }
}

async function runBatch(runtime: ExtractionRuntime, emails: string[], options: CliOptions) {
  const requests = emails.map((text) => createExtractionRequest(text, options.entityTypes));

  const results = await runtime.orchestrator.runBatch(requests, {
    workerLimit: options.workers ?? config.workerConcurrency,
    onProgress: ({ completed, total }) => {
      process.stderr.write(`Progress: ${completed}/${total}\n`);
    },
  });

  for (const result of results) {
    process.stdout.write(`${renderResult(result)}\n\n`);
  }
}

async function runMeasure(runtime: ExtractionRuntime, emails: string[], options: CliOptions) {
  const report = await measureTimes(emails, options.entityTypes, {
    extractor: runtime.session,
    orchestrator: runtime.orchestrator,
    levels: options.levels ?? config.timingLevels,
    outputFile: options.output ?? config.timingOutputFile,
  });

  process.stdout.write(report.lines.join(''));
  process.stdout.write(`Timing results saved in ${report.outputFile}\n`);
}

async function main(argv: string[]): Promise<void> {
  const options = parseCliArgs(argv);
  const emails = await loadEmails(options);

  if (emails.length === 0) {
    throw new Error('Please enter or load at least one email.');
  }

  logger.info('Loaded emails', { count: emails.length, mode: options.mode });

  const runtime = createExtractionRuntime(config);

  switch (options.mode) {
    case 'stream':
      return runStream(runtime, emails, options);
    case 'batch':
      return runBatch(runtime, emails, options);
    case 'measure':
      return runMeasure(runtime, emails, options);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error('Extraction CLI failed', error);
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exitCode = 1;
});
