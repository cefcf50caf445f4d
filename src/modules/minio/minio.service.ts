import { Injectable, Logger, OnModuleInit, Inject } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as Minio from 'minio';
import minioConfig from '../../config/minio.config';

@Injectable()
export class MinioService implements OnModuleInit {
  private readonly logger = new Logger(MinioService.name);
  private readonly client: Minio.Client;
  private readonly bucketName: string;

  constructor(
    @Inject(minioConfig.KEY) config: ConfigType<typeof minioConfig>,
  ) {
    this.client = new Minio.Client({
      endPoint: config.endpoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucketName = config.bucket;
  }

  async onModuleInit() {
    this.logger.log(`Checking for MinIO bucket: '${this.bucketName}'...`);
    const bucketExists = await this.client.bucketExists(this.bucketName);
    if (!bucketExists) {
      this.logger.warn(`Bucket '${this.bucketName}' does not exist. Creating...`);
      await this.client.makeBucket(this.bucketName, 'us-east-1');
      this.logger.log(`Bucket '${this.bucketName}' created successfully.`);
    } else {
      this.logger.log(`MinIO bucket '${this.bucketName}' found.`);
    }
  }

  getBucketName() {
    return this.bucketName;
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    await this.client.putObject(this.bucketName, key, body, body.length, {
      'Content-Type': contentType,
    });
    this.logger.log(`Uploaded '${key}' to bucket '${this.bucketName}' (${body.length} bytes)`);
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    const stream = await this.client.getObject(bucket, key);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }
}
