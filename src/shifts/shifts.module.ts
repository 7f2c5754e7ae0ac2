import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { SessionsModule } from '../sessions/sessions.module.js';
import { ShiftsController } from './shifts.controller.js';
import { ShiftsService } from './shifts.service.js';

@Module({
  imports: [EngineModule, SessionsModule],
  controllers: [ShiftsController],
  providers: [ShiftsService],
})
export class ShiftsModule {}
