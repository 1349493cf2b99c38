import { Body, Controller, Get, Logger, Param, Patch, UseFilters } from '@nestjs/common';
import { ConnectionRegistryService } from '@career-agent/agent/connections';
import { ConversationHistory, ConversationStoreService } from '@career-agent/agent/session';
import { ConversationStatus } from '@career-agent/shared/types';
import { UpdateStatusRequestDto, updateStatusRequestSchema } from './dto';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';
import { DomainExceptionFilter } from './filters/domain-exception.filter';

@Controller('api/conversations')
@UseFilters(DomainExceptionFilter)
export class ConversationController {
  private readonly logger = new Logger(ConversationController.name);

  constructor(
    private readonly store: ConversationStoreService,
    private readonly registry: ConnectionRegistryService
  ) {}

  /**
   * Route: GET /api/conversations/:id
   */
  @Get(':id')
  async getHistory(@Param('id') conversationId: string): Promise<ConversationHistory> {
    return this.store.getHistory(conversationId);
  }

  /**
   * Route: PATCH /api/conversations/:id/status
   *
   * Body: { "status": "completed" }
   * Only active conversations count toward the user's active conversations.
   */
  @Patch(':id/status')
  async updateStatus(
    @Param('id') conversationId: string,
    @Body(new ZodValidationPipe(updateStatusRequestSchema)) body: UpdateStatusRequestDto
  ): Promise<{ conversationId: string; status: ConversationStatus; lastActivity: string }> {
    this.logger.log(`[${conversationId}] Status update requested: ${body.status}`);
    const session = await this.store.updateStatus(conversationId, body.status);

    if (session.status === ConversationStatus.ACTIVE) {
      this.registry.trackConversation(session.userId, session.id);
    } else {
      this.registry.untrackConversation(session.userId, session.id);
    }

    return {
      conversationId: session.id,
      status: session.status,
      lastActivity: session.lastActivity.toISOString(),
    };
  }
}
