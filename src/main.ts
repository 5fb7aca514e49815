import 'reflect-metadata';
import { LogLevel, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigurationError } from './modules/utils/upstream-error';

function resolveLogLevels(level: string | undefined): LogLevel[] {
  switch (level) {
    case 'debug':
    case 'verbose':
      return ['log', 'error', 'warn', 'debug', 'verbose'];
    case 'warn':
      return ['error', 'warn'];
    case 'error':
      return ['error'];
    default:
      return ['log', 'error', 'warn'];
  }
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3000);

  const logger = new Logger('Bootstrap');
  logger.log(
    `Weather provider: ${configService.get<string>('WEATHER_PROVIDER', 'openweathermap')}`,
  );
  logger.log('Global validation pipe enabled with transformation');

  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error(
      `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  process.exit(1);
});
