import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/errors/ask.errors';
import { MinioService } from '../minio/minio.service';
import { IngestionService } from '../rag/services/ingestion.service';
import { UnsupportedMaterialError } from '../rag/services/text-extractor.service';
import { decodeObjectKey, studyMaterialEventSchema } from './study-material-event';

export interface IngestionSummary {
  records: number;
  chunks: number;
  skipped: number;
  failed: number;
}

/**
 * Consumer Service - Kafka study material ingestion
 */
@Injectable()
export class ConsumerService {
  private readonly logger = new Logger(ConsumerService.name);

  constructor(
    private readonly minioService: MinioService,
    private readonly ingestionService: IngestionService,
  ) { }

  async handleStudyMaterialEvent(message: unknown): Promise<IngestionSummary> {
    const parsed = studyMaterialEventSchema.safeParse(message);
    if (!parsed.success) {
      throw new Error(`Invalid study material event: ${parsed.error.message}`);
    }

    const summary: IngestionSummary = { records: 0, chunks: 0, skipped: 0, failed: 0 };

    for (const record of parsed.data.Records) {
      const bucket = record.s3.bucket.name;
      let key = record.s3.object.key;

      try {
        key = decodeObjectKey(key);
        this.logger.log(`--> Received study material event for ${bucket}/${key}`);
        const body = await this.minioService.getObject(bucket, key);
        const result = await this.ingestionService.ingest({ key, body });
        summary.records += 1;
        summary.chunks += result.storedCount;
      } catch (err) {
        // One bad document must not stop the rest of the batch.
        if (err instanceof UnsupportedMaterialError) {
          this.logger.warn(`Skipping ${key}: ${err.message}`);
          summary.skipped += 1;
        } else {
          this.logger.error(`Error processing document ${bucket}/${key}: ${errorMessage(err)}`);
          summary.failed += 1;
        }
      }
    }

    this.logger.log(
      `🎯 Ingestion batch done: ${summary.records} processed, ${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }
}
