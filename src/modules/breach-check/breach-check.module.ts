import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { RANGE_PROVIDER } from '../../common/interfaces/range-provider.interface';
import { OfflineBreachService } from './services/offline-breach.service';
import { OnlineBreachService } from './services/online-breach.service';
import { PwnedRangeClient } from './services/pwned-range.client';

@Module({
  imports: [HttpModule],
  providers: [
    OfflineBreachService,
    OnlineBreachService,
    { provide: RANGE_PROVIDER, useClass: PwnedRangeClient },
  ],
  exports: [OfflineBreachService, OnlineBreachService],
})
export class BreachCheckModule {}
