import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConsumerService } from './consumer/consumer.service';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule.register());
  const consumer = app.get(ConsumerService);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.log(`Received ${signal}, stopping consumer`);
    consumer.requestStop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await consumer.run();
  await app.close();
}

bootstrap().then(
  () => process.exit(0),
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to initialize consumer: ${message}`);
    process.exit(1);
  },
);
