import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '../src/args.js';
import { PlacemarksError } from '../src/utils/errors.js';

const argv = (...args: string[]) => ['node', 'placemarks', ...args];

describe('parseCliArgs', () => {
  it('returns an empty flag layer with no arguments', () => {
    expect(parseCliArgs(argv())).toEqual({ flags: {}, help: false, verbose: false });
  });

  it('reads long options', () => {
    const options = parseCliArgs(argv('--clipboard', '--style', 'split', '--folder', 'Reading list', 'github'));

    expect(options.flags).toEqual({ clipboard: true, style: 'split', folder: 'Reading list', filter: 'github' });
  });

  it('reads short options', () => {
    const options = parseCliArgs(argv('-c', '-s', 'plain', '-d', 'Work', '-f', 'docs'));

    expect(options.flags).toEqual({ clipboard: true, style: 'plain', folder: 'Work', filter: 'docs' });
  });

  it('accepts --name=value', () => {
    expect(parseCliArgs(argv('--style=plain', '--folder=a=b')).flags).toEqual({ style: 'plain', folder: 'a=b' });
  });

  it('does not validate the style', () => {
    expect(parseCliArgs(argv('-s', 'weird')).flags).toEqual({ style: 'weird' });
  });

  it('treats --split as --style split', () => {
    expect(parseCliArgs(argv('--split')).flags).toEqual({ style: 'split' });
  });

  it('records --no-clipboard as an explicit false', () => {
    expect(parseCliArgs(argv('--no-clipboard')).flags).toEqual({ clipboard: false });
  });

  it('lets the last filter win between --filter and the positional', () => {
    expect(parseCliArgs(argv('-f', 'first', 'second')).flags.filter).toBe('second');
    expect(parseCliArgs(argv('second', '-f', 'first')).flags.filter).toBe('first');
  });

  it('takes arguments after -- as positional', () => {
    expect(parseCliArgs(argv('--', '-weird-pattern')).flags).toEqual({ filter: '-weird-pattern' });
  });

  it('sets help and verbose', () => {
    expect(parseCliArgs(argv('-h', '-v'))).toEqual({ flags: {}, help: true, verbose: true });
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(argv('--colour'))).toThrow(PlacemarksError);
    expect(() => parseCliArgs(argv('--colour'))).toThrow('Unknown option: --colour');
  });

  it('rejects an option missing its value', () => {
    expect(() => parseCliArgs(argv('--folder'))).toThrow('Option --folder requires a value');
  });

  it('rejects a value on a switch', () => {
    expect(() => parseCliArgs(argv('--clipboard=yes'))).toThrow('Option --clipboard does not take a value');
  });

  it('rejects a second positional argument', () => {
    expect(() => parseCliArgs(argv('one', 'two'))).toThrow('Unexpected argument: two');
  });
});
