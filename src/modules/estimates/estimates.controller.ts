import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { EstimateSubjects } from '../../config';
import { AnalyzeEstimateDto, ResumeEstimateDto } from './dto';
import { EstimatesService } from './estimates.service';

@Controller()
export class EstimatesController {
  constructor(private readonly estimatesService: EstimatesService) {}

  @MessagePattern(EstimateSubjects.analyze)
  analyze(@Payload() payload: AnalyzeEstimateDto) {
    return this.estimatesService.analyze(payload);
  }

  @MessagePattern(EstimateSubjects.resume)
  resume(@Payload() payload: ResumeEstimateDto) {
    return this.estimatesService.resume(payload);
  }

  @MessagePattern(EstimateSubjects.health)
  health() {
    return this.estimatesService.health();
  }
}
