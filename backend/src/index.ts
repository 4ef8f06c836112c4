import { parseEnv } from './config/env';
import { loadSessionConfig } from './config/sessionConfig';
import { createApp } from './app';
import { openSessionRepository, type SqliteSessionRepository } from './services/database';
import { loadManifestFile } from './services/manifest';
import { ResultExporter } from './services/resultExporter';
import { SessionController } from './services/sessionController';
import { logger } from './utils/logger';

const seedIfEmpty = async (repository: SqliteSessionRepository, manifestPath?: string) => {
  const snapshot = await repository.load();
  if (snapshot.pairs.length > 0) {
    logger.info(`📂 Resuming session with ${snapshot.pairs.length} stored pairs`);
    return;
  }
  if (!manifestPath) {
    throw new Error('Database is empty and MANIFEST_PATH is not set');
  }
  const seed = await loadManifestFile(manifestPath);
  await repository.seed(seed.trajectories, seed.pairs);
};

// Initialize database and start server
const startServer = async () => {
  const env = parseEnv(process.env);
  const config = loadSessionConfig(env.SESSION_CONFIG_PATH);
  const repository = openSessionRepository(env.DATABASE_PATH);

  try {
    await seedIfEmpty(repository, env.MANIFEST_PATH);

    const session = await SessionController.open({
      config,
      repository,
      rewardAggregation: env.REWARD_AGGREGATION,
      exporter: new ResultExporter(env.RESULT_FILE),
    });

    const app = createApp(session, env);
    const server = app.listen(env.PORT, () => {
      logger.info(`🚀 Preference session API running on port ${env.PORT}`);
      logger.info(`📊 Environment: ${env.NODE_ENV}`);
      logger.info(`🔗 Health check: http://localhost:${env.PORT}/health`);
    });

    // Handle graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`📦 ${signal} received, shutting down`);
      server.close();
      try {
        await session.terminate();
      } catch (error) {
        logger.error('❌ Session did not terminate cleanly', { error: String(error) });
      }
      await repository.close();
      process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        shutdown(signal).catch(error => {
          logger.error('❌ Shutdown failed', { error: String(error) });
          process.exit(1);
        });
      });
    }
  } catch (error) {
    logger.error('Failed to start server:', { error: String(error) });
    await repository.close();
    process.exit(1);
  }
};

startServer().catch(error => {
  logger.error('Failed to start server:', { error: String(error) });
  process.exit(1);
});
