import 'dotenv/config';
import { Server } from 'http';
import { getConfig, getModeName, loadAccounts } from './config';
import {
  createFollowerFetcher,
  createMockFollowerFetcher,
  FollowerFetcher,
  runTracker,
} from './services';
import { startChartServer } from './server/app';
import { logger } from './utils/logger';

// ═══════════════════════════════════════════════════════════
// Main Application Entry Point
// ═══════════════════════════════════════════════════════════

let isShuttingDown = false;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<number> {
  const config = getConfig();

  logger.info('═══════════════════════════════════════════════════════════');
  logger.info('  Follower Tracker');
  logger.info('═══════════════════════════════════════════════════════════');
  logger.info(`Environment: ${config.NODE_ENV}`);
  logger.info(`Mode: ${getModeName()}`);

  const directory = await loadAccounts(config.PATHS.accountsFile);
  logger.info(`Tracking ${directory.accounts.length} accounts: ${directory.usernames.join(', ')}`);

  const fetcher: FollowerFetcher = config.MOCK_FETCH
    ? createMockFollowerFetcher()
    : createFollowerFetcher({ apiKey: config.API.key, host: config.API.host });

  const result = await runTracker({
    fetcher,
    directory,
    storagePath: config.PATHS.storage,
    chartPath: config.PATHS.chart,
  });

  if (result.status === 'fetch_failed') {
    return 1;
  }

  if (!config.SERVE_CHART) {
    if (result.chartPath) {
      logger.info(`Open ${result.chartPath} to view the chart`);
    }
    return 0;
  }

  const server = await startChartServer({
    storagePath: config.PATHS.storage,
    port: config.PORT,
    exposeErrors: config.NODE_ENV !== 'production',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress...');
      return;
    }
    isShuttingDown = true;
    logger.info(`${signal} received, stopping chart server`);

    try {
      await closeServer(server);
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return 0;
}

main()
  .then(code => {
    if (code !== 0) {
      process.exitCode = code;
    }
  })
  .catch((error: unknown) => {
    logger.error('Follower tracker failed:', error);
    process.exitCode = 1;
  });
