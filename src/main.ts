import dotenv from 'dotenv';
import { ServiceBootstrap } from './core';
import { log } from './utils/logger';
import { setupGlobalErrorHandling } from './utils/errors';

// 加载环境变量
dotenv.config();

/**
 * 进程入口点
 */
async function main(): Promise<void> {
  setupGlobalErrorHandling();

  log.info('Starting service', {
    environment: process.env.NODE_ENV || 'development',
    nodeVersion: process.version,
    pid: process.pid
  });

  const bootstrap = ServiceBootstrap.fromEnvironment(process.env);
  const exitCode = await bootstrap.run();

  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((error) => {
    log.error('Unhandled error in main', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  });
}
