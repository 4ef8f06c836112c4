import { parseEnv } from '../config/env';
import { openSessionRepository } from '../services/database';
import { loadManifestFile } from '../services/manifest';
import { logger } from '../utils/logger';

/**
 * Loads a session manifest into an empty database.
 * Usage: npm run seed -- <manifest.json>   (falls back to MANIFEST_PATH)
 */
async function main(): Promise<void> {
  const env = parseEnv(process.env);
  const manifestPath = process.argv[2] ?? env.MANIFEST_PATH;
  if (!manifestPath) {
    throw new Error('No manifest given: pass a path or set MANIFEST_PATH');
  }

  logger.info('🚀 Starting database seeding process...', { manifestPath, database: env.DATABASE_PATH });
  const repository = openSessionRepository(env.DATABASE_PATH);

  try {
    const existing = await repository.load();
    if (existing.pairs.length > 0) {
      logger.warn(`⚠️ Database already holds ${existing.pairs.length} pairs, nothing seeded`);
      return;
    }

    const seed = await loadManifestFile(manifestPath);
    await repository.seed(seed.trajectories, seed.pairs);
    logger.info('🎉 Database seeding completed successfully!');
  } finally {
    await repository.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('❌ Database seeding failed:', { error: String(error) });
    process.exit(1);
  });
}
