import { Module } from '@nestjs/common';
import { AmortizationService } from './amortization.service';

@Module({
  providers: [AmortizationService],
  exports: [AmortizationService],
})
export class AmortizationModule {}
