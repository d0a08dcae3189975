import { Module } from '@nestjs/common';

import { MatchProviderClient } from './match-provider.client';

@Module({
  providers: [MatchProviderClient],
  exports: [MatchProviderClient],
})
export class MatchProviderModule {}
