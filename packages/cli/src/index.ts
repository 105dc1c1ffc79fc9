#!/usr/bin/env node

/**
 * tessera - demo dashboard for the rendering engine
 *
 * Main entry point for the application.
 */

import { readFileSync } from 'node:fs';
import { AnsiBackend, Program, logger, setConsoleLoggingEnabled, setLogLevel } from '@tessera/tui';
import chalk from 'chalk';
import { createDashboard } from './demo/dashboard.js';
import { loadConfig } from './utils/config.js';

function getVersion(): string {
  try {
    const pkgPath = new URL('../package.json', import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

function getHelpText(): string {
  return [
    'tessera - terminal rendering demo',
    '',
    'Usage:',
    '  tessera [options]',
    '',
    'Options:',
    '  --help           Show this help and exit',
    '  --version        Show version and exit',
    '  --no-alt-screen  Draw in the main screen buffer',
    '',
    'Environment:',
    '  TESSERA_ALT_SCREEN   Use the alternate screen (0/1, default: 1)',
    '  TESSERA_TICK_MS      Redraw interval in ms (default: 250)',
    '  TESSERA_COLOR_LEVEL  Colour depth 0-3 (default: 3)',
    '  TESSERA_LOG_FILE     Write a session log under .tessera/logs (0/1)',
    '  LOG_LEVEL            debug, info, warn or error',
    '',
    'Press Ctrl+C to quit.'
  ].join('\n');
}

async function main(): Promise<void> {
  try {
    const args = process.argv.slice(2);
    if (args.includes('--help')) {
      console.log(getHelpText());
      process.exit(0);
    }

    if (args.includes('--version')) {
      console.log(`tessera ${getVersion()}`);
      process.exit(0);
    }

    const config = loadConfig();
    setLogLevel(config.logging.level);
    if (config.logging.file) {
      logger.init(config.paths.projectRoot);
    }

    // Console lines would land on the drawn screen
    setConsoleLoggingEnabled(false);
    logger.info('Starting dashboard', { render: config.render });

    const altScreen = config.render.altScreen && !args.includes('--no-alt-screen');
    const backend = new AnsiBackend({ altScreen, colorLevel: config.render.colorLevel });
    const { init, update, view } = createDashboard({ tickMs: config.render.tickMs });

    const program = new Program(init, update, view, { backend });
    await program.run();
    logger.close();
    // Pending tick timers would otherwise keep the process alive
    process.exit(0);
  } catch (error) {
    setConsoleLoggingEnabled(true);
    console.error(chalk.red('\n❌ Fatal error:'), error);
    logger.error(`Fatal error: ${error}`);
    logger.close();
    process.exit(1);
  }
}

void main();
