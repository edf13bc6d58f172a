import dotenv from 'dotenv';
import { createLogger } from '../../shared/src/index.js';
import { runCommand } from './commands.js';
import { loadConfig, validateConfig } from './config.js';
import { RealTrader } from './real-trader.js';

// Load environment variables from parent directory
dotenv.config({ path: '../.env' });
dotenv.config(); // Also load from current directory if exists

const logger = createLogger('main');

// Main execution
async function main(): Promise<void> {
  const config = loadConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    logger.error(`❌ Invalid configuration: ${errors.join('; ')}`);
    process.exit(1);
  }

  const trader = new RealTrader(config);
  const [command = 'start', ...rest] = process.argv.slice(2);

  if (command !== 'start') {
    const code = await runCommand(trader, [command, ...rest]);
    await trader.shutdown();
    process.exit(code);
  }

  const shutdown = (signal: string) => {
    logger.info(`📴 Received ${signal}, shutting down...`);
    trader.shutdown()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('💥 Error during shutdown', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await trader.start();
  } catch (error) {
    logger.error('💥 Failed to start VWAP trader', error);
    await trader.shutdown();
    process.exit(1);
  }
}

main().catch(error => {
  logger.error('💥 Unhandled error in main', error);
  process.exit(1);
});
