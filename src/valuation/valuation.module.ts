import { Module } from '@nestjs/common';
import { ValuationFeedService } from './valuation-feed.service';
import { ValuationMatcherService } from './valuation-matcher.service';

@Module({
  providers: [ValuationFeedService, ValuationMatcherService],
  exports: [ValuationFeedService, ValuationMatcherService],
})
export class ValuationModule {}
