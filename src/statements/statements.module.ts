import { Module } from '@nestjs/common';
import { AmortizationModule } from '../amortization/amortization.module';
import { TradeBookModule } from '../trade-book/trade-book.module';
import { ValuationModule } from '../valuation/valuation.module';
import { StatementsController } from './statements.controller';
import { StatementPipelineService } from './statement-pipeline.service';
import { StatementRendererService } from './statement-renderer.service';

@Module({
  imports: [TradeBookModule, ValuationModule, AmortizationModule],
  controllers: [StatementsController],
  providers: [
    StatementRendererService,
    StatementPipelineService, // merge -> compute -> render
  ],
})
export class StatementsModule {}
