import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logger, setConsoleLoggingEnabled } from '@tessera/tui';
import { loadConfig, resetConfig } from './config.js';

describe('loadConfig', () => {
  let homeDir: string;
  let projectRoot: string;

  function writeJson(file: string, content: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  }

  const userSettings = (content: unknown) => writeJson(path.join(homeDir, '.tessera', 'settings.json'), content);
  const projectConfig = (content: unknown) => writeJson(path.join(projectRoot, '.tessera', 'config.json'), content);

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-home-'));
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'tessera-project-'));
    resetConfig();
    setConsoleLoggingEnabled(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setConsoleLoggingEnabled(true);
    resetConfig();
    fs.rmSync(homeDir, { recursive: true, force: true });
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    const config = loadConfig({ homeDir, projectRoot, env: {} });

    expect(config.render).toEqual({ altScreen: true, tickMs: 250, colorLevel: 3 });
    expect(config.logging).toEqual({ level: 'info', file: false });
    expect(config.paths).toEqual({
      homeDir,
      tesseraDir: path.join(homeDir, '.tessera'),
      projectRoot: path.resolve(projectRoot)
    });
  });

  it('should layer project config over user settings', () => {
    userSettings({ render: { tickMs: 100, colorLevel: 1 }, logging: { level: 'debug' } });
    projectConfig({ render: { tickMs: 40 } });

    const config = loadConfig({ homeDir, projectRoot, env: {} });

    expect(config.render).toEqual({ altScreen: true, tickMs: 40, colorLevel: 1 });
    expect(config.logging.level).toBe('debug');
  });

  it('should let the environment win over both files', () => {
    userSettings({ render: { altScreen: true } });
    projectConfig({ render: { colorLevel: 2 }, logging: { file: false } });

    const config = loadConfig({
      homeDir,
      projectRoot,
      env: {
        TESSERA_ALT_SCREEN: '0',
        TESSERA_TICK_MS: '1000',
        TESSERA_COLOR_LEVEL: '0',
        TESSERA_LOG_FILE: 'true',
        LOG_LEVEL: 'warn'
      }
    });

    expect(config.render).toEqual({ altScreen: false, tickMs: 1000, colorLevel: 0 });
    expect(config.logging).toEqual({ level: 'warn', file: true });
  });

  it('should ignore invalid file values with a warning', () => {
    const warn = vi.spyOn(logger, 'warn');
    projectConfig({ render: { tickMs: -5, colorLevel: 7, altScreen: 'yes' }, logging: { level: 'loud' } });

    const config = loadConfig({ homeDir, projectRoot, env: {} });

    expect(config.render).toEqual({ altScreen: true, tickMs: 250, colorLevel: 3 });
    expect(config.logging.level).toBe('info');
    expect(warn).toHaveBeenCalledTimes(4);
  });

  it('should skip unreadable settings files', () => {
    const warn = vi.spyOn(logger, 'warn');
    userSettings('{ not json');

    const config = loadConfig({ homeDir, projectRoot, env: {} });

    expect(config.render.tickMs).toBe(250);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^Ignoring unreadable settings file /);
  });

  it('should ignore invalid environment values with a warning', () => {
    const warn = vi.spyOn(logger, 'warn');

    const config = loadConfig({
      homeDir,
      projectRoot,
      env: { TESSERA_ALT_SCREEN: 'maybe', TESSERA_TICK_MS: 'fast', LOG_LEVEL: 'verbose' }
    });

    expect(config.render.altScreen).toBe(true);
    expect(config.render.tickMs).toBe(250);
    expect(config.logging.level).toBe('info');
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('should cache the first result until reset', () => {
    const first = loadConfig({ homeDir, projectRoot, env: {} });
    expect(loadConfig({ homeDir, projectRoot, env: { TESSERA_TICK_MS: '10' } })).toBe(first);

    resetConfig();
    expect(loadConfig({ homeDir, projectRoot, env: { TESSERA_TICK_MS: '10' } }).render.tickMs).toBe(10);
  });
});
