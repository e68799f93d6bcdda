import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import { CustomLoggerService } from './common/logging/custom-logger.service';
import { SystemEventType } from './entities/system-log.entity';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  // Get custom logger
  const logger = app.get(CustomLoggerService);
  app.useLogger(logger);

  // Enable CORS for frontend
  const origins: string[] = ['http://localhost:3000'];
  if (process.env.FRONTEND_URL) {
    origins.push(process.env.FRONTEND_URL);
  }
  app.enableCors({ origin: origins, credentials: true });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Stop the monitoring loop cleanly on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Start server
  const port = process.env.PORT || 3001;
  await app.listen(port);

  // Log system start
  await logger.logSystem({
    level: 'info',
    eventType: SystemEventType.SYSTEM_START,
    message: `FX monitor API started on port ${port}`,
    component: 'Main',
    metadata: {
      port,
      nodeEnv: process.env.NODE_ENV,
    },
  });

  logger.log(`Application is running on: http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application', error);
  process.exit(1);
});
