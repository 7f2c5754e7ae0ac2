import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ConfigModule } from './config/config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { SessionsModule } from './sessions/sessions.module.js';
import { ShiftsModule } from './shifts/shifts.module.js';

function jwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (secret) return secret;
  if (process.env.NODE_ENV === 'production') {
    throw new Error('JWT_SECRET must be set in production');
  }
  return 'dev-secret';
}

@Module({
  imports: [
    JwtModule.register({
      global: true,
      secret: jwtSecret(),
      signOptions: { expiresIn: '7d' },
    }),
    DrizzleModule,
    ConfigModule,
    ContentModule,
    EngineModule,
    SessionsModule,
    ShiftsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
