import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import milvusConfig from '../../config/milvus.config';
import { MilvusService } from './milvus.service';

/**
 * Milvus Module - Vector Database Integration
 */
@Module({
    imports: [ConfigModule.forFeature(milvusConfig)],
    providers: [MilvusService],
    exports: [MilvusService],
})
export class MilvusModule { }
