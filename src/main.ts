import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigType } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import appConfig from './config/app.config';
import { KafkaService } from './modules/kafka/kafka.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);

  configureApp(app);

  const kafkaService = app.get(KafkaService);
  app.connectMicroservice(kafkaService.getOptions());

  // Enable graceful shutdown
  app.enableShutdownHooks();

  await app.startAllMicroservices();
  const { port, host } = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  const config = new DocumentBuilder()
    .setTitle('Study Assistant API')
    .setDescription('Question answering over indexed study material')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  await app.listen(port, host);

  const url = await app.getUrl();
  logger.log(`🚀 Application is running on: ${url}`);
  logger.log(`📚 Swagger UI available at: ${url}/api`);
  logger.log(`✅ Kafka consumer listening for study material events.`);
}

bootstrap().catch((error: unknown) => {
  new NestLogger('Bootstrap').error(
    `❌ Failed to start application: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
