import { Module } from '@nestjs/common';

import { RedisModule } from '../redis/redis.module';
import { LEDGER_CLOCK, systemClock } from './ledger.clock';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { LedgerStore } from './ledger.store';
import { PrincipalAuthGuard } from './principal-auth.guard';

@Module({
  imports: [RedisModule],
  controllers: [LedgerController],
  providers: [
    LedgerService,
    LedgerStore,
    PrincipalAuthGuard,
    {
      provide: LEDGER_CLOCK,
      useValue: systemClock,
    },
  ],
  exports: [LedgerService],
})
export class LedgerModule {}
