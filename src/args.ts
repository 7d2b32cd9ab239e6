/**
 * Command-line argument parsing.
 */

import type { CliOptions } from './types.js';
import { PlacemarksError } from './utils/errors.js';

export const USAGE = `
Usage: placemarks [options] [filter]

List the bookmarks in one Firefox folder as org-mode links.

Options:
  -c, --clipboard        Copy the output to the X clipboard (via xclip)
      --no-clipboard     Print to stdout even if the config file enables the clipboard
  -s, --style <style>    unified | split | plain (default: unified)
      --split            Shorthand for --style split
  -d, --folder <name>    Bookmark folder to read (default: toolbar)
  -f, --filter <regex>   Only bookmarks whose URL or title match (case-insensitive)
  -v, --verbose          Log diagnostics to stderr
  -h, --help             Show this help

Config file: ~/.config/placemarks/config.yaml (keys: clipboard, style, folder, filter)

Examples:
  placemarks
  placemarks --style split github
  placemarks -c -d "Reading list"
`;

function invalidArguments(message: string): PlacemarksError {
  return new PlacemarksError('invalid_arguments', message, 'Run `placemarks --help` for usage.');
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { flags: {}, help: false, verbose: false };
  let positional: string | undefined;
  let optionsEnded = false;

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (raw === undefined) continue;

    if (optionsEnded || raw === '-' || !raw.startsWith('-')) {
      if (positional !== undefined) {
        throw invalidArguments(`Unexpected argument: ${raw}`);
      }
      positional = raw;
      options.flags.filter = raw;
      continue;
    }

    if (raw === '--') {
      optionsEnded = true;
      continue;
    }

    // --name=value
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : raw.slice(eq + 1);

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined) {
        throw invalidArguments(`Option ${arg} requires a value`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--clipboard':
      case '-c':
        options.flags.clipboard = true;
        break;
      case '--no-clipboard':
        options.flags.clipboard = false;
        break;
      case '--style':
      case '-s':
        options.flags.style = takeValue();
        break;
      case '--split':
        options.flags.style = 'split';
        break;
      case '--folder':
      case '-d':
        options.flags.folder = takeValue();
        break;
      case '--filter':
      case '-f':
        options.flags.filter = takeValue();
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw invalidArguments(`Unknown option: ${arg}`);
    }

    if (inlineValue !== undefined && !['--style', '--folder', '--filter'].includes(arg)) {
      throw invalidArguments(`Option ${arg} does not take a value`);
    }
  }

  return options;
}
