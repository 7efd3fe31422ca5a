import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ENV_DEFAULTS } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  const port = cfg.get<number>('PORT') ?? ENV_DEFAULTS.PORT;
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`🚀 Bot listening on port ${port}`);
}

// A ConfigurationError surfaces while AppModule loads, before this runs.
bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    err instanceof Error ? err.stack ?? err.message : String(err),
  );
  process.exit(1);
});
