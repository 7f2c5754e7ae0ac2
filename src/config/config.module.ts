import { Global, Module } from '@nestjs/common';
import { GameConfigService } from './game-config.service.js';
import { GameSettingsController } from './game-settings.controller.js';

@Global()
@Module({
  controllers: [GameSettingsController],
  providers: [GameConfigService],
  exports: [GameConfigService],
})
export class ConfigModule {}
