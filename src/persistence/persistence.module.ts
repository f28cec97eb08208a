import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { FileContextStore, FileJobStore } from './file';
import { CONTEXT_STORE, IContextStore, IJobStore, JOB_STORE } from './interfaces';
import { InMemoryContextStore, InMemoryJobStore } from './memory';

function useMemory(configService: ConfigService): boolean {
  return configService.get<string>('storage.driver', 'file') === 'memory';
}

/**
 * Persistence Module
 *
 * Provides the context and job stores. STORAGE_DRIVER picks JSON files
 * under DATA_DIR (default) or process memory.
 * Global module - exports are available throughout the application.
 */
@Global()
@Module({
  providers: [
    InMemoryContextStore,
    InMemoryJobStore,
    FileContextStore,
    FileJobStore,
    {
      provide: CONTEXT_STORE,
      useFactory: (
        configService: ConfigService,
        memory: InMemoryContextStore,
        file: FileContextStore,
      ): IContextStore => (useMemory(configService) ? memory : file),
      inject: [ConfigService, InMemoryContextStore, FileContextStore],
    },
    {
      provide: JOB_STORE,
      useFactory: (
        configService: ConfigService,
        memory: InMemoryJobStore,
        file: FileJobStore,
      ): IJobStore => (useMemory(configService) ? memory : file),
      inject: [ConfigService, InMemoryJobStore, FileJobStore],
    },
  ],
  exports: [CONTEXT_STORE, JOB_STORE],
})
export class PersistenceModule {}
