import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { errorMessage } from '../../common/errors/ask.errors';
import { MilvusService } from '../milvus/milvus.service';

@Injectable()
export class MilvusHealthIndicator extends HealthIndicator {
    constructor(private readonly milvusService: MilvusService) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        try {
            const health = await this.milvusService.getClient().checkHealth();
            if (!health.isHealthy) {
                throw new Error(health.reasons.join(', ') || 'unhealthy');
            }
            return this.getStatus(key, true);
        } catch (error) {
            throw new HealthCheckError(
                'Milvus health check failed',
                this.getStatus(key, false, { message: errorMessage(error) }),
            );
        }
    }
}
