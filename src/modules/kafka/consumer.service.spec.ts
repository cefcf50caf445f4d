import { Test } from '@nestjs/testing';
import { MinioService } from '../minio/minio.service';
import { IngestionService } from '../rag/services/ingestion.service';
import { UnsupportedMaterialError } from '../rag/services/text-extractor.service';
import { IngestionResult, StudyMaterial } from '../rag/types';
import { ConsumerService } from './consumer.service';

jest.mock('pdf-parse', () => jest.fn());
jest.mock('@zilliz/milvus2-sdk-node', () => ({}));

const record = (key: string) => ({ s3: { bucket: { name: 'study-material' }, object: { key } } });

describe('ConsumerService', () => {
  let service: ConsumerService;
  let getObject: jest.Mock<Promise<Buffer>, [string, string]>;
  let ingest: jest.Mock<Promise<IngestionResult>, [StudyMaterial]>;

  beforeEach(async () => {
    getObject = jest.fn(async (_bucket: string, key: string) => Buffer.from(`contents of ${key}`));
    ingest = jest.fn(async (material: StudyMaterial) => ({ key: material.key, chunkCount: 3, storedCount: 3 }));

    const moduleRef = await Test.createTestingModule({
      providers: [
        ConsumerService,
        { provide: MinioService, useValue: { getObject } },
        { provide: IngestionService, useValue: { ingest } },
      ],
    }).compile();
    service = moduleRef.get(ConsumerService);
  });

  it('ingests every record in the event', async () => {
    ingest.mockResolvedValueOnce({ key: 'materials/IAM basics.md', chunkCount: 2, storedCount: 2 });

    const summary = await service.handleStudyMaterialEvent({
      Records: [record('materials/IAM+basics.md'), record('materials/vpc.pdf')],
    });

    expect(summary).toEqual({ records: 2, chunks: 5, skipped: 0, failed: 0 });
    expect(getObject).toHaveBeenNthCalledWith(1, 'study-material', 'materials/IAM basics.md');
    expect(ingest).toHaveBeenNthCalledWith(1, {
      key: 'materials/IAM basics.md',
      body: Buffer.from('contents of materials/IAM basics.md'),
    });
  });

  it('keeps going after a bad record', async () => {
    ingest.mockRejectedValueOnce(new UnsupportedMaterialError('materials/deck.pptx'));
    getObject.mockImplementation(async (_bucket: string, key: string) => {
      if (key === 'materials/missing.md') {
        throw new Error('The specified key does not exist.');
      }
      return Buffer.from(key);
    });

    const summary = await service.handleStudyMaterialEvent({
      Records: [record('materials/deck.pptx'), record('materials/missing.md'), record('materials/s3.md')],
    });

    expect(summary).toEqual({ records: 1, chunks: 3, skipped: 1, failed: 1 });
  });

  it('counts a key with a broken escape as failed and ingests the rest', async () => {
    const summary = await service.handleStudyMaterialEvent({
      Records: [record('materials/100%.md'), record('materials/ok.md')],
    });

    expect(summary).toEqual({ records: 1, chunks: 3, skipped: 0, failed: 1 });
    expect(getObject).toHaveBeenCalledTimes(1);
    expect(ingest).toHaveBeenCalledWith({ key: 'materials/ok.md', body: Buffer.from('contents of materials/ok.md') });
  });

  it('rejects messages that are not study material events', async () => {
    await expect(service.handleStudyMaterialEvent({ hello: 'world' })).rejects.toThrow(
      /^Invalid study material event: /,
    );
    expect(getObject).not.toHaveBeenCalled();
  });
});
