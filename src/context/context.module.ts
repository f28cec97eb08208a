import { Module } from '@nestjs/common';

import { ContextListenerService, ContextService } from './services';

/**
 * Context Module
 *
 * User preferences and conversation history on top of the context store.
 */
@Module({
  providers: [ContextService, ContextListenerService],
  exports: [ContextService],
})
export class ContextModule {}
