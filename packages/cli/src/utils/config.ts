/**
 * Configuration Manager
 *
 * Priority: environment > project .tessera/config.json > ~/.tessera/settings.json > defaults
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import type { ColorSupportLevel } from 'chalk';
import { getErrorMessage, isLogLevel, logger, type LogLevel } from '@tessera/tui';

// ============================================================================
// Types
// ============================================================================

export interface TesseraConfig {
  render: {
    altScreen: boolean;
    tickMs: number;
    colorLevel: ColorSupportLevel;
  };
  logging: {
    level: LogLevel;
    file: boolean;
  };
  paths: {
    homeDir: string;
    tesseraDir: string;
    projectRoot: string;
  };
}

export interface ConfigOverrides {
  homeDir?: string;
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
}

type Settings = {
  -readonly [K in keyof Omit<TesseraConfig, 'paths'>]: Partial<TesseraConfig[K]>;
};

// ============================================================================
// Defaults
// ============================================================================

const DEFAULTS: Omit<TesseraConfig, 'paths'> = {
  render: {
    altScreen: true,
    tickMs: 250,
    colorLevel: 3
  },
  logging: {
    level: 'info',
    file: false
  }
};

// ============================================================================
// Singleton Config
// ============================================================================

let config: TesseraConfig | null = null;

/**
 * Get tessera home directory (~/.tessera)
 */
export function getTesseraDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.tessera');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isColorLevel(value: unknown): value is ColorSupportLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function isTickMs(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Read one settings file. Unknown keys are ignored; values of the wrong
 * type are dropped with a warning.
 */
function loadSettingsFile(filePath: string): Settings {
  const settings: Settings = { render: {}, logging: {} };
  if (!fs.existsSync(filePath)) return settings;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    logger.warn(`Ignoring unreadable settings file ${filePath}: ${getErrorMessage(error)}`);
    return settings;
  }
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring settings file ${filePath}: expected a JSON object`);
    return settings;
  }

  const invalid = (key: string, value: unknown): void => {
    logger.warn(`Ignoring invalid value for ${key} in ${filePath}`, { value });
  };

  const render = parsed.render;
  if (isRecord(render)) {
    if (render.altScreen !== undefined) {
      if (typeof render.altScreen === 'boolean') settings.render.altScreen = render.altScreen;
      else invalid('render.altScreen', render.altScreen);
    }
    if (render.tickMs !== undefined) {
      if (isTickMs(render.tickMs)) settings.render.tickMs = render.tickMs;
      else invalid('render.tickMs', render.tickMs);
    }
    if (render.colorLevel !== undefined) {
      if (isColorLevel(render.colorLevel)) settings.render.colorLevel = render.colorLevel;
      else invalid('render.colorLevel', render.colorLevel);
    }
  }

  const logging = parsed.logging;
  if (isRecord(logging)) {
    if (logging.level !== undefined) {
      if (isLogLevel(logging.level)) settings.logging.level = logging.level;
      else invalid('logging.level', logging.level);
    }
    if (logging.file !== undefined) {
      if (typeof logging.file === 'boolean') settings.logging.file = logging.file;
      else invalid('logging.file', logging.file);
    }
  }

  return settings;
}

function parseFlag(value: string): boolean | undefined {
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  return undefined;
}

/**
 * Settings taken from environment variables
 */
function loadEnvSettings(env: NodeJS.ProcessEnv): Settings {
  const settings: Settings = { render: {}, logging: {} };
  const invalid = (name: string, value: string): void => {
    logger.warn(`Ignoring invalid value for ${name}`, { value });
  };

  const altScreen = env.TESSERA_ALT_SCREEN;
  if (altScreen !== undefined) {
    const flag = parseFlag(altScreen);
    if (flag === undefined) invalid('TESSERA_ALT_SCREEN', altScreen);
    else settings.render.altScreen = flag;
  }

  const tickMs = env.TESSERA_TICK_MS;
  if (tickMs !== undefined) {
    const parsed = Number(tickMs);
    if (isTickMs(parsed)) settings.render.tickMs = parsed;
    else invalid('TESSERA_TICK_MS', tickMs);
  }

  const colorLevel = env.TESSERA_COLOR_LEVEL;
  if (colorLevel !== undefined) {
    const parsed = Number(colorLevel);
    if (isColorLevel(parsed)) settings.render.colorLevel = parsed;
    else invalid('TESSERA_COLOR_LEVEL', colorLevel);
  }

  const level = env.LOG_LEVEL;
  if (level !== undefined) {
    if (isLogLevel(level)) settings.logging.level = level;
    else invalid('LOG_LEVEL', level);
  }

  const logFile = env.TESSERA_LOG_FILE;
  if (logFile !== undefined) {
    const flag = parseFlag(logFile);
    if (flag === undefined) invalid('TESSERA_LOG_FILE', logFile);
    else settings.logging.file = flag;
  }

  return settings;
}

function apply(target: TesseraConfig, settings: Settings): void {
  Object.assign(target.render, settings.render);
  Object.assign(target.logging, settings.logging);
}

/**
 * Load configuration once; later calls return the cached value
 */
export function loadConfig(overrides: ConfigOverrides = {}): TesseraConfig {
  if (config) return config;

  const homeDir = overrides.homeDir ?? os.homedir();
  const tesseraDir = getTesseraDir(homeDir);
  const projectRoot = path.resolve(overrides.projectRoot ?? process.cwd());

  // Start with defaults
  const loaded: TesseraConfig = {
    render: { ...DEFAULTS.render },
    logging: { ...DEFAULTS.logging },
    paths: { homeDir, tesseraDir, projectRoot }
  };

  apply(loaded, loadSettingsFile(path.join(tesseraDir, 'settings.json')));
  apply(loaded, loadSettingsFile(path.join(projectRoot, '.tessera', 'config.json')));
  apply(loaded, loadEnvSettings(overrides.env ?? process.env));

  config = loaded;
  return config;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  config = null;
}
