#!/usr/bin/env node
/**
 * placemarks CLI
 *
 * List the bookmarks in a Firefox folder as org-mode links.
 */

import { USAGE, parseCliArgs } from './args.js';
import { loadEnvironment } from './env.js';
import { runExport } from './run.js';
import { isPlacemarksError, toErrorMessage } from './utils/errors.js';
import { setVerbose } from './utils/logger.js';

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv);
  if (options.help) {
    console.log(USAGE);
    process.exit(0);
    return;
  }

  const env = loadEnvironment();
  setVerbose(options.verbose || env.debug);

  await runExport(options, { env });
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error(`placemarks: ${toErrorMessage(error)}`);
  if (isPlacemarksError(error) && error.suggestion) {
    console.error(`Hint: ${error.suggestion}`);
  }
  process.exit(1);
});
