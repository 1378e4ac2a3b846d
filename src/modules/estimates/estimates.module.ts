import { Module } from '@nestjs/common';

import { envs } from '../../config';
import { NatsModule } from '../../transports/nats.module';
import { EstimatesController } from './estimates.controller';
import { EstimatesService, TRADE_KEYWORDS } from './estimates.service';
import { AzureLayoutService } from './extractors/azure-layout.service';
import { TableExtractionService } from './extractors/table-extraction.service';
import { loadTradeKeywords } from './pipeline';

@Module({
  imports: [NatsModule],
  controllers: [EstimatesController],
  providers: [
    EstimatesService,
    TableExtractionService,
    AzureLayoutService,
    { provide: TRADE_KEYWORDS, useFactory: () => loadTradeKeywords(envs.tradeKeywordsFile) },
  ],
})
export class EstimatesModule {}
