import { Controller } from '@nestjs/common';
import { EventPattern, Payload } from '@nestjs/microservices';
import { ConsumerService, IngestionSummary } from './consumer.service';
import { STUDY_MATERIAL_TOPIC } from './kafka.constants';

@Controller()
export class ConsumerController {
  constructor(private readonly consumerService: ConsumerService) {}

  @EventPattern(STUDY_MATERIAL_TOPIC)
  handleStudyMaterial(@Payload() message: unknown): Promise<IngestionSummary> {
    return this.consumerService.handleStudyMaterialEvent(message);
  }
}
