#!/usr/bin/env node
/**
 * mindweave - stateful agent with peer belief sync
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainer, type Container } from './core/container.js';
import { createCommandShell, type CommandShell } from './shell/command-shell.js';

/**
 * Phenomena fed to a mind that has no saved state yet.
 */
const SEED_PHENOMENA = [
  'System boot sequence complete.',
  "Query received: 'Hello?'",
  'Data stream detected: 2,3,5,7,11,13',
  "Query received: 'Hello?'",
];

let container: Container | undefined;
let shell: CommandShell | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainer({
    onActions: (actions) => {
      shell?.announce(actions);
    },
  });

  const { logger, mind, restored, peerService } = container;

  logger.info(
    { id: mind.id, identity: mind.getSelfConcept().identity, restored },
    'Mind ready'
  );

  if (!restored) {
    for (const text of SEED_PHENOMENA) {
      await mind.ingest(text);
    }
    logger.info({ count: SEED_PHENOMENA.length }, 'Seeded initial phenomena');
  }

  shell = createCommandShell(mind, peerService, logger, { onQuit: shutdown });
  container.start();
  shell.start([
    '------------------------------------------------------',
    ' mindweave - interactive agent shell',
    ` Identity: ${mind.getSelfConcept().identity}  |  Telos: ${mind.getTelos()}`,
    " Type 'help' for commands.",
    '------------------------------------------------------',
  ]);
}

// Handle shutdown gracefully
async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  shell?.close();

  let graceMs = 0;
  if (container) {
    graceMs = container.config.shutdown.graceMs;
    await container.shutdown();
  }

  // Let in-flight sends drain
  setTimeout(() => {
    process.exit(0);
  }, graceMs);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown();
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown();
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
