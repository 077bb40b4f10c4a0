#!/usr/bin/env tsx
// ============================================================================
// TsuryPhone Bridge - Command Line Entry Point
// Runs the bridge in the foreground until SIGINT/SIGTERM.
//
// Usage:
//   npm start                                  # Use ~/.tsuryphone/bridge.json
//   npm start -- --config ./bridge.json        # Use another config file
//   npm start -- --log-file ~/.tsuryphone/bridge.log
//   npm start -- --debug                       # Include debug lines
// ============================================================================

import fs from 'fs';
import path from 'path';
import { CONFIG_FILE, expandHome } from './config.js';
import { TsuryBridge } from './index.js';

interface CliOptions {
  configFile: string;
  logFile: string | null;
  debug: boolean;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { configFile: CONFIG_FILE, logFile: null, debug: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === '--config' || arg === '-c') && next) {
      options.configFile = expandHome(next);
      i++;
    } else if (arg === '--log-file' && next) {
      options.logFile = expandHome(next);
      i++;
    } else if (arg === '--debug') {
      options.debug = true;
    }
  }

  return options;
}

/**
 * Send console output to a file, each line stamped with an ISO timestamp.
 * Returns the stream so it can be closed on shutdown.
 */
function redirectConsole(logFile: string): fs.WriteStream {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });
  const logPrefix = () => `[${new Date().toISOString()}]`;

  console.log = (...args: unknown[]) => {
    logStream.write(`${logPrefix()} ${args.join(' ')}\n`);
  };
  console.warn = (...args: unknown[]) => {
    logStream.write(`${logPrefix()} WARN: ${args.join(' ')}\n`);
  };
  console.error = (...args: unknown[]) => {
    logStream.write(`${logPrefix()} ERROR: ${args.join(' ')}\n`);
  };

  return logStream;
}

async function run(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const logStream = options.logFile ? redirectConsole(options.logFile) : null;

  console.log('TsuryPhone Bridge (foreground mode)');
  console.log(`PID: ${process.pid}`);
  console.log(`Config: ${options.configFile}`);

  const bridge = new TsuryBridge(options.debug ? { logging: { debug: true } } : undefined, options.configFile);
  if (bridge.deviceIds().length === 0) {
    console.error(`No valid devices configured in ${options.configFile}`);
    await bridge.stop();
    logStream?.end();
    process.exitCode = 1;
    return;
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('Shutting down...');
    await bridge.stop();
    logStream?.end();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await bridge.start();
  console.log(`Bridge is running for ${bridge.deviceIds().join(', ')}. Press Ctrl+C to stop.`);
}

run().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
