import { Module } from '@nestjs/common';

import { EstimatesModule } from './modules/estimates/estimates.module';
import { NatsModule } from './transports/nats.module';

@Module({
  imports: [NatsModule, EstimatesModule],
})
export class AppModule {}
