import { Module } from '@nestjs/common';

import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import { LruEvictionPolicy } from './session-eviction';
import { InMemorySessionStore, SESSION_STORE } from './session.store';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

@Module({
  controllers: [SessionsController],
  providers: [
    SessionsService,
    {
      provide: SESSION_STORE,
      inject: [aidraConfig.KEY],
      useFactory: (config: AidraConfig) =>
        new InMemorySessionStore(
          config.sessions.maxEntries > 0
            ? new LruEvictionPolicy(config.sessions.maxEntries)
            : undefined,
        ),
    },
  ],
  exports: [SessionsService],
})
export class SessionsModule {}
