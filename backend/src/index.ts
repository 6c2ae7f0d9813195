import { config } from './config/config';
import { DatabaseConnection } from './database/connection';
import { createServices } from './bootstrap';

async function startServer(): Promise<void> {
  const database = DatabaseConnection.fromConfig(config.database, config.nodeEnv === 'development');

  const connected = await database.testConnection();
  if (!connected) {
    await database.close();
    throw new Error('Database is not reachable');
  }
  console.log('✅ Connected to database');

  if (config.database.autoMigrate) {
    await database.initializeSchema();
  }

  const services = createServices(database.pool, config);
  services.reaper.start();

  console.log(`🚀 SealDrop core ready (${config.nodeEnv})`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`📴 ${signal} received, shutting down...`);

    services.reaper.stop();
    try {
      await database.close();
      process.exit(0);
    } catch (error) {
      console.error('❌ Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

startServer().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
