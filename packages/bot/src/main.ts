import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config({ path: process.cwd() + '/.env' });
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './modules/app.module';
import { GlobalExceptionFilter } from './modules/common/global-exception.filter';
import { StructuredLoggerService, logger } from './modules/common/structured-logger.service';
import { GAME_CONFIG, GameConfig } from './modules/config/game-config';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: false }),
    { bufferLogs: true },
  );
  app.useLogger(app.get(StructuredLoggerService));

  // Filtre global pour la gestion des erreurs
  app.useGlobalFilters(new GlobalExceptionFilter());
  app.enableShutdownHooks();

  const config = app.get<GameConfig>(GAME_CONFIG);
  await app.listen(config.port, '0.0.0.0');

  logger.info('Mesh bot started', {
    port: config.port,
    env: process.env.NODE_ENV || 'development',
    ledger: config.ledgerBackend,
    channel: config.gameChannelName,
    admins: config.adminNodeIds.length,
  });
}

bootstrap().catch((err) => {
  logger.error('Fatal bootstrap error', err);
  process.exit(1);
});
