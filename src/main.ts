// Server entry point
import { ENV, validateEnvironment } from './config/environment.js';
import { databaseManager } from './infrastructure/database.js';
import { createMongoRepositories } from './infrastructure/repositories/index.js';
import { createSmtpMailer } from './infrastructure/EmailTool.js';
import { buildApp } from './app.js';

async function bootstrap() {
  try {
    validateEnvironment();

    // Connect to database
    try {
      await databaseManager.connect();
    } catch (error) {
      console.warn('⚠️ MongoDB connection failed, continuing without database...');
      console.warn('   This is normal during development setup');
    }

    const fastify = await buildApp({
      repositories: createMongoRepositories(),
      mailer: createSmtpMailer()
    });

    // Graceful shutdown
    const gracefulShutdown = async (signal: string) => {
      console.log(`\n🔄 Received ${signal}. Starting graceful shutdown...`);

      try {
        await fastify.close();
        await databaseManager.disconnect();
        console.log('✅ Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        console.error('❌ Error during shutdown:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    await fastify.listen({ port: ENV.SERVER_PORT, host: ENV.HOST });

    console.log('🚀 Review service started successfully!');
    console.log(`📍 Server running on http://${ENV.HOST}:${ENV.SERVER_PORT}`);
    console.log(`🌍 Environment: ${ENV.NODE_ENV}`);
    console.log(`📊 Health check: http://${ENV.HOST}:${ENV.SERVER_PORT}/health`);
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

bootstrap().catch((error) => {
  console.error('❌ Bootstrap failed:', error);
  process.exit(1);
});
