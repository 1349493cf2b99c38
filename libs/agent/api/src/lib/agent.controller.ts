import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
  UseFilters,
} from '@nestjs/common';
import {
  AgentType,
  Channel,
  DispatchFailureKind,
  MessageKind,
  isAgentType,
} from '@career-agent/shared/types';
import { AGENT_CONFIGS, AgentRouterService, ChatService, ChatTurnResult } from '@career-agent/agent/core';
import {
  AnalyzeSkillsRequestDto,
  CareerGuidanceRequestDto,
  ChatRequestDto,
  ChatTurnResponseDto,
  ANONYMOUS_USER,
  analyzeSkillsRequestSchema,
  careerGuidanceRequestSchema,
  chatRequestSchema,
} from './dto';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';
import { DomainExceptionFilter } from './filters/domain-exception.filter';

export interface AgentInfo {
  type: string;
  name: string;
  description: string;
  capabilities: string[];
  supportedMessageKinds: string[];
}

/**
 * Agent Controller - chat turns over HTTP
 *
 * Every turn goes through the same ChatService the duplex gateway uses, so
 * the response is also pushed to the user's live connection (or queued).
 * Turns without a userId run as anonymous and are never pushed.
 */
@Controller('api')
@UseFilters(DomainExceptionFilter)
export class AgentController {
  private readonly logger = new Logger(AgentController.name);

  constructor(
    private readonly chatService: ChatService,
    private readonly router: AgentRouterService
  ) {}

  /**
   * Route: POST /api/chat
   *
   * Body: { "message": "...", "agentType"?: "career_advisor", "userId"?: "u1", "conversationId"?: "..." }
   * An unknown agent type answers 400 with the degraded response as the body.
   */
  @Post('chat')
  @HttpCode(200)
  async chat(
    @Body(new ZodValidationPipe(chatRequestSchema)) body: ChatRequestDto
  ): Promise<ChatTurnResponseDto> {
    const userId = body.userId ?? ANONYMOUS_USER;
    this.logger.log(`[${userId}] Chat turn for ${body.agentType}`);

    const turn = await this.chatService.handleTurn({
      userId,
      notify: body.userId !== undefined,
      agentType: body.agentType,
      content: body.message,
      conversationId: body.conversationId,
      payload: { kind: MessageKind.TEXT, metadata: { channel: Channel.HTTP } },
    });

    const response = this.toResponseDto(turn);
    if (turn.result.status === 'degraded' && turn.result.failure.kind === DispatchFailureKind.UNKNOWN_AGENT) {
      throw new BadRequestException(response);
    }
    return response;
  }

  /**
   * Route: POST /api/chat/analyze-skills
   *
   * Body: { "text": "...", "userId"?: "u1", "documentType"?: "resume", "existingSkills"?: [] }
   */
  @Post('chat/analyze-skills')
  @HttpCode(200)
  async analyzeSkills(
    @Body(new ZodValidationPipe(analyzeSkillsRequestSchema)) body: AnalyzeSkillsRequestDto
  ): Promise<ChatTurnResponseDto> {
    const userId = body.userId ?? ANONYMOUS_USER;
    this.logger.log(`[${userId}] Skill analysis (${body.documentType}, ${body.text.length} chars)`);

    const turn = await this.chatService.handleTurn({
      userId,
      notify: body.userId !== undefined,
      agentType: AgentType.SKILLS_ANALYZER,
      content: body.text,
      conversationId: body.conversationId,
      sessionType: 'skills_analysis',
      payload: {
        kind: MessageKind.SKILL_EXTRACTION,
        metadata: {
          channel: Channel.HTTP,
          documentType: body.documentType,
          existingSkills: body.existingSkills,
        },
      },
    });

    return this.toResponseDto(turn);
  }

  /**
   * Route: POST /api/chat/career-guidance
   *
   * Body: { "userId": "u1", "careerGoals": ["..."], "industryPreferences"?: [], "locationPreferences"?: [] }
   * The goals are recorded on the conversation.
   */
  @Post('chat/career-guidance')
  @HttpCode(200)
  async careerGuidance(
    @Body(new ZodValidationPipe(careerGuidanceRequestSchema)) body: CareerGuidanceRequestDto
  ): Promise<ChatTurnResponseDto> {
    this.logger.log(`[${body.userId}] Career guidance for ${body.careerGoals.length} goals`);

    const turn = await this.chatService.handleTurn({
      userId: body.userId,
      agentType: AgentType.CAREER_ADVISOR,
      content: `Help me reach these career goals: ${body.careerGoals.join('; ')}`,
      conversationId: body.conversationId,
      sessionType: 'career_guidance',
      goals: body.careerGoals,
      payload: {
        kind: MessageKind.CAREER_ANALYSIS,
        metadata: {
          channel: Channel.HTTP,
          careerGoals: body.careerGoals,
          industryPreferences: body.industryPreferences,
          locationPreferences: body.locationPreferences,
        },
      },
    });

    return this.toResponseDto(turn);
  }

  /**
   * Route: GET /api/agents
   */
  @Get('agents')
  listAgents(): { total: number; agents: AgentInfo[] } {
    const agents = this.router.listAgents().map((type): AgentInfo => {
      if (!isAgentType(type)) {
        return { type, name: type, description: '', capabilities: [], supportedMessageKinds: [] };
      }
      const config = AGENT_CONFIGS[type];
      return {
        type,
        name: config.name,
        description: config.description,
        capabilities: [...config.capabilities],
        supportedMessageKinds: [...config.supportedMessageKinds],
      };
    });

    return { total: agents.length, agents };
  }

  private toResponseDto(turn: ChatTurnResult): ChatTurnResponseDto {
    return {
      conversationId: turn.conversationId,
      messageId: turn.message.id,
      agentResponse: turn.result.response,
      delivered: turn.delivered,
      timestamp: new Date().toISOString(),
    };
  }
}
