#!/usr/bin/env node
/**
 * STORE CLI STARTUP SCRIPT
 *
 * Builds the demo store, wires the production effects and runs the menu
 * until the operator quits.
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv, makeAppEffects} from '../effects/EffectsFactory';
import {Store} from '../store/Store';
import {runMenu} from './menu';
import {seedInventory} from './inventory';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const appEffects = makeAppEffects(config);
  const {logger, terminal} = appEffects;

  const store = seedInventory().caseOf({
    Left: error => {
      throw new Error(`Opening inventory is invalid (${error.kind}): ${error.message}`);
    },
    Right: products => new Store(products),
  });

  logger.info(`🚀 ${config.storeName} started with ${store.listProducts().length} products`);
  logger.debug(`Log level: ${config.logLevel}`);

  const shutdown = (signal: string) => {
    logger.info(`⏸️  Received ${signal}, shutting down...`);
    terminal.close();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await runMenu(store, {storeName: config.storeName})(appEffects);
  } finally {
    terminal.close();
  }
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
