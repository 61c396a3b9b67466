import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import type { LogLevel } from '@bitforge/types';
import { ConfigError } from '../errors/BitforgeError.js';
import { isLogLevel, LOG_LEVELS } from '../logging/Logger.js';
import { DEFAULT_LAUNCHER } from '../commands/CommandGraph.js';

/**
 * bitforge configuration.
 *
 * YAML Location: .bitforge/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * logLevel: info
 * logFile: .bitforge/configure.log
 *
 * # Name of the generated build-rule file inside the work root
 * makefile: Makefile
 *
 * # Make variable prefixed to every command (e.g. to run tools in a container)
 * launcher: BITFORGE_LAUNCHER
 *
 * # Fail on flow switch values the flow does not document
 * strict: true
 * ```
 */
export interface BitforgeConfig {
  logLevel: LogLevel;
  /** Optional log file, relative to the project directory */
  logFile?: string;
  makefile: string;
  launcher: string;
  /**
   * true (default): an unrecognized value for a switch that elides stages
   * (e.g. synth: vivado in the ise flow) fails the build.
   * false: the value is reported and the stage is kept.
   */
  strict: boolean;
}

export const DEFAULT_CONFIG: BitforgeConfig = {
  logLevel: 'info',
  makefile: 'Makefile',
  launcher: DEFAULT_LAUNCHER,
  strict: true,
};

const MAKE_VARIABLE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Load the configuration from `<projectPath>/.bitforge/config.yaml`.
 *
 * - Missing file: defaults
 * - Unparseable YAML: warning, defaults
 * - Parsed but invalid values: ConfigError
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): BitforgeConfig {
  const configPath = join(projectPath, '.bitforge', 'config.yaml');
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // Empty or comment-only file
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  return validateConfig(parsed, configPath);
}

/**
 * Validate a parsed config object and merge it over the defaults.
 * THROWS ConfigError on the first invalid field.
 */
export function validateConfig(parsed: unknown, filePath?: string): BitforgeConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config error: config must be a mapping', { filePath });
  }
  const raw: Record<string, unknown> = { ...parsed };

  const fail = (field: string, message: string): never => {
    throw new ConfigError(`Config error: ${field} ${message}`, { filePath, field, value: raw[field] });
  };

  const config: BitforgeConfig = { ...DEFAULT_CONFIG };

  if (raw.logLevel !== undefined && raw.logLevel !== null) {
    if (!isLogLevel(raw.logLevel)) fail('logLevel', `must be one of ${LOG_LEVELS.join(', ')}`);
    else config.logLevel = raw.logLevel;
  }

  if (raw.logFile !== undefined && raw.logFile !== null) {
    if (typeof raw.logFile !== 'string' || !raw.logFile.trim()) fail('logFile', 'must be a non-empty string');
    else config.logFile = raw.logFile;
  }

  if (raw.makefile !== undefined && raw.makefile !== null) {
    if (typeof raw.makefile !== 'string' || !raw.makefile.trim()) fail('makefile', 'must be a non-empty string');
    else if (raw.makefile.includes('/') || raw.makefile.includes('\\')) fail('makefile', 'must be a file name, not a path');
    else config.makefile = raw.makefile;
  }

  if (raw.launcher !== undefined && raw.launcher !== null) {
    if (typeof raw.launcher !== 'string' || !MAKE_VARIABLE.test(raw.launcher)) {
      fail('launcher', 'must be a make variable name');
    } else {
      config.launcher = raw.launcher;
    }
  }

  if (raw.strict !== undefined && raw.strict !== null) {
    if (typeof raw.strict !== 'boolean') fail('strict', `must be a boolean, got ${typeof raw.strict}`);
    else config.strict = raw.strict;
  }

  return config;
}
