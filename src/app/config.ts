/**
 * CLI-specific config loading.
 *
 * Wraps the library-level parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving the
 * credentials path and producing the output of the `config` command.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { type ResolvedConfig, DEFAULT_CONFIG, parseConfig, resolveConfig } from '../config.js';

export const CONFIG_FILE_NAME = 'sheetfolio.toml';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./sheetfolio.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/sheetfolio/sheetfolio.toml` (or
 *    `~/.config/sheetfolio/sheetfolio.toml`), whether or not it exists.
 */
export function defaultConfigPath(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): string {
  const localConfig = path.resolve(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome =
    env.XDG_CONFIG_HOME !== undefined && env.XDG_CONFIG_HOME !== ''
      ? env.XDG_CONFIG_HOME
      : path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'sheetfolio', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

/**
 * Load and resolve the configuration. A missing file yields the defaults,
 * resolved against the directory the file would live in.
 *
 * @param configPath - Explicit path to a TOML file; {@link defaultConfigPath}
 *   when omitted.
 */
export async function loadConfig(
  configPath?: string,
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const resolvedPath =
    configPath !== undefined ? path.resolve(configPath) : defaultConfigPath();
  const configDir = path.dirname(resolvedPath);

  if (fs.existsSync(resolvedPath)) {
    const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
    return { configPath: resolvedPath, config: resolveConfig(parseConfig(tomlStr), configDir) };
  }

  return { configPath: resolvedPath, config: resolveConfig(DEFAULT_CONFIG, configDir) };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

export interface ConfigOutput {
  config_file: string;
  spreadsheet_id: string | null;
  credentials_file: string;
  worksheets: ResolvedConfig['worksheets'];
  display: ResolvedConfig['display'];
}

/** JSON output of the `config` command. */
export function configOutput(configPath: string, config: ResolvedConfig): ConfigOutput {
  return {
    config_file: configPath,
    spreadsheet_id: config.spreadsheet.id ?? null,
    credentials_file: config.credentials_path,
    worksheets: { ...config.worksheets },
    display: { ...config.display },
  };
}
