#!/usr/bin/env node

/**
 * parkscan CLI
 *
 * Usage: parkscan <url> [<url> ...]
 *
 * Classifies each URL in turn and prints one JSON report per line to stdout.
 * Logs go to stderr.
 */

import 'dotenv/config';
import { createClassificationPipeline } from './core/pipeline.js';
import { parseParkscanConfig } from './utils/env-parser.js';
import { logger } from './utils/logger.js';

const log = logger.create('Cli');

async function main(): Promise<number> {
  const urls = process.argv.slice(2).filter((arg) => !arg.startsWith('-'));
  if (urls.length === 0) {
    process.stderr.write('Usage: parkscan <url> [<url> ...]\n');
    return 2;
  }

  const pipeline = createClassificationPipeline(parseParkscanConfig());
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  await pipeline.runAll(urls, { signal: controller.signal }, (report) => {
    process.stdout.write(`${JSON.stringify(report)}\n`);
  });
  return controller.signal.aborted ? 130 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error('Classification run failed', { error });
    process.exitCode = 1;
  });
