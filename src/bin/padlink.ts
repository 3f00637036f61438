#!/usr/bin/env node
/**
 * padlink - Runs the link coordinator in the foreground.
 *
 * Listens for the USB tunnel, browses the LAN and prints every control
 * message it receives. Useful for checking a controller end to end without
 * a MIDI engine attached.
 *
 * @example
 * ```bash
 * padlink
 * padlink --tunnel-port 9400 --name "Studio Mac" --log-level debug
 * padlink --no-lan
 * ```
 */

import { parseArgs } from 'node:util';

import { VERSION } from '../index.js';
import { configFromEnv, parseLogLevel, resolveConfig, type PadlinkConfigInput } from '../config.js';
import { ConnectionCoordinator } from '../coordinator/connection-coordinator.js';
import { createConsoleLogger } from '../core/logger.js';
import { CommandDeviceMonitor } from '../devices/device-monitor.js';
import { InvalidConfigError } from '../link/errors.js';
import type { MidiSink } from '../midi/midi-bridge.js';

// =============================================================================
// Help & Version Output
// =============================================================================

function printHelp(): void {
  const help = `
padlink - Link coordinator for a touch MIDI controller

USAGE:
  padlink [OPTIONS]

OPTIONS:
  -p, --tunnel-port <number>  Loopback port for the USB tunnel (default: 9360)
  -n, --name <string>         Name announced to peers (default: padlink)
      --no-lan                Disable LAN discovery
      --watch-devices         Poll 'idevice_id -l' for USB attach events
  -l, --log-level <level>     debug, info, warn, error, silent (default: info)
  -h, --help                  Show this help message
  -v, --version               Show version number

ENVIRONMENT:
  PADLINK_DEVICE_NAME, PADLINK_TUNNEL_PORT, PADLINK_TUNNEL_HOST,
  PADLINK_LAN, PADLINK_SERVICE_TYPE, PADLINK_LOG_LEVEL
`.trim();

  console.log(help);
}

// =============================================================================
// Console Sink
// =============================================================================

const consoleSink: MidiSink = {
  controlChange(message) {
    const label = message.label ? ` (${message.label})` : '';
    console.log(`CC   ch=${message.channel} cc=${message.cc} value=${message.value}${label}`);
  },
  note(message) {
    const label = message.label ? ` (${message.label})` : '';
    console.log(`NOTE ch=${message.channel} note=${message.note} velocity=${message.velocity}${label}`);
  },
  transport(message) {
    console.log(`TRANSPORT ${message.action}`);
  },
};

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let args;
  try {
    args = parseArgs({
      options: {
        'tunnel-port': { type: 'string', short: 'p' },
        name: { type: 'string', short: 'n' },
        'no-lan': { type: 'boolean', default: false },
        'watch-devices': { type: 'boolean', default: false },
        'log-level': { type: 'string', short: 'l' },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error('Run "padlink --help" for usage information.');
    process.exit(1);
  }

  const values = args.values;
  if (values.help) {
    printHelp();
    return;
  }
  if (values.version) {
    console.log(`padlink v${VERSION}`);
    return;
  }

  const flags: PadlinkConfigInput = {};
  if (values.name !== undefined) flags.deviceName = values.name;
  if (values['log-level'] !== undefined) flags.logLevel = parseLogLevel(values['log-level'], 'info');
  if (values['tunnel-port'] !== undefined) {
    const port = Number.parseInt(values['tunnel-port'], 10);
    if (Number.isNaN(port)) {
      throw new InvalidConfigError([`--tunnel-port: '${values['tunnel-port']}' is not a number`]);
    }
    flags.tunnel = { port };
  }
  if (values['no-lan']) flags.lan = { enabled: false };

  const config = resolveConfig(configFromEnv(process.env), flags);
  const logger = createConsoleLogger({ level: config.logLevel, scope: 'padlink' });

  const coordinator = ConnectionCoordinator.fromConfig(config, {
    sink: consoleSink,
    logger,
    devices: values['watch-devices'] ? new CommandDeviceMonitor({ logger }) : undefined,
  });

  coordinator.on('status', (status) => logger.info(`status: ${status}`));
  coordinator.on('peers', (peers) => {
    logger.info('LAN peers', { peers: peers.map((peer) => `${peer.name}@${peer.host}:${peer.port}`) });
  });
  coordinator.on('feedback', (feedback) => logger.debug('feedback', { ...feedback }));

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`received ${signal}, shutting down`);
    coordinator.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed', { error: err instanceof Error ? err : String(err) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await coordinator.start();
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
