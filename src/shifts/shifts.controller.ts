import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  VersionedBodySchema,
  type VersionedBody,
} from '../sessions/dto/versioned.dto.js';
import { ShiftsService } from './shifts.service.js';
import { DecideBodySchema, type DecideBody } from './dto/decide.dto.js';

@Controller('v1/sessions/:sessionId')
@UseGuards(AuthGuard)
export class ShiftsController {
  constructor(private readonly shiftsService: ShiftsService) {}

  @Post('encounters')
  @HttpCode(HttpStatus.OK)
  async nextEncounter(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(VersionedBodySchema)) body: VersionedBody,
  ) {
    return this.shiftsService.nextEncounter(sessionId, userId, body);
  }

  @Post('decisions')
  @HttpCode(HttpStatus.OK)
  async decide(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(DecideBodySchema)) body: DecideBody,
  ) {
    return this.shiftsService.decide(sessionId, userId, body);
  }

  @Post('advance-day')
  @HttpCode(HttpStatus.OK)
  async advanceDay(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(VersionedBodySchema)) body: VersionedBody,
  ) {
    return this.shiftsService.advanceDay(sessionId, userId, body);
  }
}
