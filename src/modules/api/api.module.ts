import { Module } from '@nestjs/common';
import { AskController } from './ask.controller';
import { MaterialsController } from './materials.controller';
import { MaterialsService } from './materials.service';
import { RagModule } from '../rag/rag.module';
import { MinioModule } from '../minio/minio.module';
import { KafkaModule } from '../kafka/kafka.module';

/**
 * API Module - question answering and study material upload
 */
@Module({
  imports: [RagModule, MinioModule, KafkaModule],
  controllers: [AskController, MaterialsController],
  providers: [MaterialsService],
})
export class ApiModule { }
