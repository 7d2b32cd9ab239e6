/**
 * Environment Capability
 *
 * Every value placemarks reads from the outside world (home directory,
 * temp directory, env vars) lives here, so tests can hand in fake paths.
 */

import os from 'node:os';
import path from 'node:path';

export interface Environment {
  homeDir: string;
  tmpDir: string;
  /** $XDG_CONFIG_HOME or ~/.config */
  configHome: string;
  /** Firefox configuration root, holding profiles.ini */
  firefoxDir: string;
  configFile: string;
  debug: boolean;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references.
 * Unset variables are left as written.
 */
export function expandPath(value: string, homeDir: string, source: EnvSource): string {
  const withHome = value === '~' || value.startsWith('~/') ? homeDir + value.slice(1) : value;
  return withHome.replace(/\$(?:\{(\w+)\}|(\w+))/g, (match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return source[name] ?? match;
  });
}

function isTruthy(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function loadEnvironment(
  source: EnvSource = process.env,
  homeDir: string = os.homedir(),
  tmpDir: string = os.tmpdir()
): Environment {
  const expand = (value: string) => expandPath(value, homeDir, source);

  const configHome = source.XDG_CONFIG_HOME ? expand(source.XDG_CONFIG_HOME) : path.join(homeDir, '.config');
  const firefoxDir = expand(source.PLACEMARKS_FIREFOX_DIR || '~/.mozilla/firefox');
  const configFile = source.PLACEMARKS_CONFIG
    ? expand(source.PLACEMARKS_CONFIG)
    : path.join(configHome, 'placemarks', 'config.yaml');

  return {
    homeDir,
    tmpDir,
    configHome,
    firefoxDir,
    configFile,
    debug: isTruthy(source.PLACEMARKS_DEBUG) || isTruthy(source.DEBUG),
  };
}
