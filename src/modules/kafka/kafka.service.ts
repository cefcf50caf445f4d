import { Inject, Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { Kafka, Admin, Producer } from 'kafkajs';
import kafkaConfig from '../../config/kafka.config';
import { STUDY_MATERIAL_TOPIC } from './kafka.constants';
import { buildStudyMaterialEvent } from './study-material-event';

@Injectable()
export class KafkaService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaService.name);
  private readonly kafka: Kafka;
  private readonly admin: Admin;
  private readonly producer: Producer;

  constructor(@Inject(kafkaConfig.KEY) private readonly config: ConfigType<typeof kafkaConfig>) {
    this.kafka = new Kafka({
      clientId: config.clientId,
      brokers: [config.broker],
    });
    this.admin = this.kafka.admin();
    this.producer = this.kafka.producer();
  }

  async onModuleInit() {
    this.logger.log('Connecting Kafka admin and producer...');
    await this.admin.connect();
    await this.producer.connect();
    this.logger.log('Kafka admin and producer connected successfully.');
  }

  async onModuleDestroy() {
    await this.producer.disconnect();
    await this.admin.disconnect();
    this.logger.log('Kafka admin and producer disconnected');
  }

  getAdmin() {
    return this.admin;
  }

  async publishStudyMaterialEvent(bucket: string, key: string): Promise<void> {
    this.logger.log(`Publishing ingestion event for '${key}' to topic '${STUDY_MATERIAL_TOPIC}'...`);
    await this.producer.send({
      topic: STUDY_MATERIAL_TOPIC,
      messages: [{ key, value: JSON.stringify(buildStudyMaterialEvent(bucket, key)) }],
    });
  }

  getOptions(): MicroserviceOptions {
    const { broker, clientId, consumerGroupId } = this.config;

    this.logger.log(
      `Connecting to Kafka broker at ${broker} with client ID '${clientId}' and group ID '${consumerGroupId}'`,
    );

    return {
      transport: Transport.KAFKA,
      options: {
        client: {
          clientId: `${clientId}-consumer`,
          brokers: [broker],
        },
        consumer: {
          groupId: consumerGroupId,
        },
        subscribe: {
          fromBeginning: true,
        },
      },
    };
  }
}
