import { Module } from '@nestjs/common';

import { IntentResolverService } from './intent-resolver.service';

@Module({
  providers: [IntentResolverService],
  exports: [IntentResolverService],
})
export class IntentModule {}
