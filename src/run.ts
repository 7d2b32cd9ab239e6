import { resolveSettings } from './config.js';
import type { Environment } from './env.js';
import { extractBookmarks } from './extractor.js';
import { filterBookmarks } from './filter.js';
import { formatBookmarks } from './formatter.js';
import { deliverOutput, type ClipboardWriter, type LineWriter } from './output.js';
import { locateBookmarksDatabase } from './profile.js';
import type { CliOptions } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('run');

export interface RunDependencies {
  env: Environment;
  write?: LineWriter;
  copy?: ClipboardWriter;
}

/**
 * Settings → profile → extract → filter → format → deliver.
 * Nothing is written until every earlier stage has succeeded.
 */
export async function runExport(options: CliOptions, deps: RunDependencies): Promise<void> {
  const { env } = deps;
  const settings = await resolveSettings(options.flags, env);
  log.debug('Effective settings:', settings);

  const dbPath = await locateBookmarksDatabase(env);
  const bookmarks = await extractBookmarks(dbPath, settings.folder, { tmpDir: env.tmpDir });
  const selected = filterBookmarks(bookmarks, settings.filter);
  const blocks = formatBookmarks(selected, settings.style);

  await deliverOutput(blocks, { clipboard: settings.clipboard, write: deps.write, copy: deps.copy });
}
