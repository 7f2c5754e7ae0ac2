import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { SessionsController } from './sessions.controller.js';
import { SessionsService } from './sessions.service.js';
import { SessionStore } from './session-store.js';
import { DrizzleSessionStore } from './drizzle-session.store.js';
import { InMemorySessionStore } from './in-memory-session.store.js';

@Module({
  imports: [EngineModule],
  controllers: [SessionsController],
  providers: [
    SessionsService,
    {
      provide: SessionStore,
      useClass:
        process.env.SESSION_STORE === 'memory'
          ? InMemorySessionStore
          : DrizzleSessionStore,
    },
  ],
  exports: [SessionsService],
})
export class SessionsModule {}
