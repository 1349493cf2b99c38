import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { WsAdapter } from '@nestjs/platform-ws';
import { AppModule } from './app/app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  app.useWebSocketAdapter(new WsAdapter(app));
  app.enableCors({
    origin: '*',
    credentials: true,
  });
  // Runs OnModuleDestroy, which closes live duplex connections
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('app.port', 3001);
  // :: binds both IPv4 and IPv6
  const host = '::';

  await app.listen(port, host);

  Logger.log(`Gateway running on ${host}:${port} (duplex at /ws)`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`, 'Bootstrap');
  process.exit(1);
});
