import { Module } from '@nestjs/common';
import { TradeBookController } from './trade-book.controller';
import { TradeBookStorageService } from './trade-book-storage.service';

@Module({
  controllers: [TradeBookController],
  providers: [TradeBookStorageService],
  exports: [TradeBookStorageService],
})
export class TradeBookModule {}
