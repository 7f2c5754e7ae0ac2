import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  GameConfigPatchSchema,
  GameConfigService,
  type GameConfigPatch,
} from './game-config.service.js';

@Controller('v1/settings/narrative')
@UseGuards(AuthGuard)
export class GameSettingsController {
  constructor(private readonly configService: GameConfigService) {}

  @Get()
  getSettings() {
    return this.configService.get();
  }

  /** Applies to the next classification or generation */
  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(GameConfigPatchSchema)) body: GameConfigPatch,
  ) {
    return this.configService.update(body);
  }
}
