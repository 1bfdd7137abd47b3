import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { StatementsModule } from './statements/statements.module';
import { TradeBookModule } from './trade-book/trade-book.module';

@Module({
  imports: [ConfigModule, TradeBookModule, StatementsModule],
  controllers: [AppController],
})
export class AppModule {}
