import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { ValidationError } from '../../common/errors/ask.errors';
import { KafkaService } from '../kafka/kafka.service';
import { MinioService } from '../minio/minio.service';
import { TextExtractorService } from '../rag/services/text-extractor.service';

export interface UploadedMaterial {
  originalname: string;
  buffer: Buffer;
  mimetype: string;
}

export interface MaterialUpload {
  status: 'accepted';
  bucket: string;
  key: string;
}

/**
 * Stores uploaded study material and queues it for ingestion.
 */
@Injectable()
export class MaterialsService {
  private readonly logger = new Logger(MaterialsService.name);

  constructor(
    private readonly minioService: MinioService,
    private readonly kafkaService: KafkaService,
    private readonly textExtractor: TextExtractorService,
  ) { }

  async upload(file: UploadedMaterial | undefined): Promise<MaterialUpload> {
    if (!file) {
      throw new ValidationError('file is required');
    }
    const fileName = path.basename(file.originalname);
    if (!this.textExtractor.isSupported(fileName)) {
      throw new ValidationError(
        `unsupported file type: ${fileName} (supported: ${this.textExtractor.supportedExtensions().join(', ')})`,
      );
    }

    const bucket = this.minioService.getBucketName();
    const key = `materials/${Date.now()}-${fileName}`;
    this.logger.log(`Received study material '${fileName}' (${file.buffer.length} bytes)`);

    await this.minioService.putObject(key, file.buffer, file.mimetype || 'application/octet-stream');
    await this.kafkaService.publishStudyMaterialEvent(bucket, key);

    return { status: 'accepted', bucket, key };
  }
}
