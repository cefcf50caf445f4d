import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import kafkaConfig from '../../config/kafka.config';
import { KafkaService } from './kafka.service';
import { ConsumerController } from './consumer.controller';
import { ConsumerService } from './consumer.service';
import { RagModule } from '../rag/rag.module';
import { MinioModule } from '../minio/minio.module';

/**
 * Kafka Module - study material ingestion via Kafka
 */
@Module({
  imports: [ConfigModule.forFeature(kafkaConfig), RagModule, MinioModule],
  controllers: [ConsumerController],
  providers: [KafkaService, ConsumerService],
  exports: [KafkaService],
})
export class KafkaModule { }
