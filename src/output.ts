/**
 * Output Sinks
 *
 * Formatted blocks go either to stdout, one line each, or to the
 * clipboard as a single buffered string.
 */

import { runXclip } from './integrations/xclip-runner.js';

export type LineWriter = (line: string) => void;
export type ClipboardWriter = (text: string) => Promise<void>;

export interface DeliveryOptions {
  clipboard: boolean;
  write?: LineWriter;
  copy?: ClipboardWriter;
}

export function writeLines(blocks: readonly string[], write: LineWriter = console.log): void {
  for (const block of blocks) {
    write(block);
  }
}

/** Every block followed by a newline. */
export function toClipboardText(blocks: readonly string[]): string {
  return blocks.map((block) => `${block}\n`).join('');
}

export async function deliverOutput(blocks: readonly string[], options: DeliveryOptions): Promise<void> {
  const { clipboard, write = console.log, copy = runXclip } = options;

  if (clipboard) {
    await copy(toClipboardText(blocks));
    return;
  }
  writeLines(blocks, write);
}
