import {
  Body,
  Controller,
  Get,
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
import { SessionsService } from './sessions.service.js';
import {
  CreateSessionBodySchema,
  type CreateSessionBody,
} from './dto/create-session.dto.js';
import {
  LockEndingPathBodySchema,
  type LockEndingPathBody,
} from './dto/lock-ending-path.dto.js';
import {
  NarrativeDecisionBodySchema,
  type NarrativeDecisionBody,
} from './dto/narrative-decision.dto.js';

@Controller('v1/sessions')
@UseGuards(AuthGuard)
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createSession(
    @UserId() userId: string,
    @Body(new ZodValidationPipe(CreateSessionBodySchema)) body: CreateSessionBody,
  ) {
    return this.sessionsService.createSession(userId, body.seed);
  }

  @Get()
  async getActiveSession(@UserId() userId: string) {
    return this.sessionsService.getActiveSession(userId);
  }

  @Get(':sessionId')
  async getSession(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
  ) {
    return this.sessionsService.getSession(sessionId, userId);
  }

  /** Debug output */
  @Get(':sessionId/report')
  async getReport(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
  ) {
    return this.sessionsService.getReport(sessionId, userId);
  }

  @Get(':sessionId/ending')
  async getEnding(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
  ) {
    return this.sessionsService.getEnding(sessionId, userId);
  }

  @Get(':sessionId/decisions')
  async getDecisions(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
  ) {
    return this.sessionsService.getDecisionAudit(sessionId, userId);
  }

  @Post(':sessionId/ending-path')
  async lockEndingPath(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(LockEndingPathBodySchema)) body: LockEndingPathBody,
  ) {
    return this.sessionsService.lockEndingPath(sessionId, userId, body);
  }

  @Post(':sessionId/narrative-decisions')
  async recordNarrativeDecision(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(NarrativeDecisionBodySchema)) body: NarrativeDecisionBody,
  ) {
    return this.sessionsService.recordNarrativeDecision(sessionId, userId, body);
  }
}
