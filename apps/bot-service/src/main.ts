import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { resolveLogLevels } from './logging';

async function bootstrap() {
  const logger = new Logger('BotService');
  const logLevels = resolveLogLevels(
    process.env.LOG_LEVEL,
    process.env.BACKGROUND_MODE === 'true',
  );
  Logger.overrideLogger(logLevels);

  // No HTTP: the bot only talks to Discord and the recorder's IPC files
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
  });

  logger.log('Bot service started');

  const shutdown = async () => {
    logger.log('Shutting down...');
    const closePromise = app.close();
    const timeoutPromise = new Promise<never>((_, reject) =>
      setTimeout(() => reject(new Error('Shutdown timeout')), 10000),
    );
    try {
      await Promise.race([closePromise, timeoutPromise]);
      process.exit(0);
    } catch (err) {
      logger.error(`Shutdown error: ${(err as Error).message}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap().catch((err) => {
  new Logger('BotService').error(`Startup failed: ${(err as Error).message}`);
  process.exit(1);
});
