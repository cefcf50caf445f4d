import { Controller, Get, Logger } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { MilvusHealthIndicator } from './milvus.health';
import { KafkaHealthIndicator } from './kafka.health';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly milvusHealth: MilvusHealthIndicator,
    private readonly kafkaHealth: KafkaHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Report vector index and Kafka reachability' })
  check(): Promise<HealthCheckResult> {
    this.logger.debug('Health check requested');
    return this.health.check([
      () => this.milvusHealth.isHealthy('milvus'),
      () => this.kafkaHealth.isHealthy('kafka'),
    ]);
  }
}
