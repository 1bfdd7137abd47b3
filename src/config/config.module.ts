import { Global, Module } from '@nestjs/common';
import { STATEMENT_CONFIG } from './statement-config.interface';
import { loadStatementConfig } from './statement-config.loader';

// Built once per process; every service receives the same object by injection.
@Global()
@Module({
  providers: [
    {
      provide: STATEMENT_CONFIG,
      useFactory: () => loadStatementConfig(process.env),
    },
  ],
  exports: [STATEMENT_CONFIG],
})
export class ConfigModule {}
