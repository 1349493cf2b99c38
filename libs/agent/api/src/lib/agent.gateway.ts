import { Logger } from '@nestjs/common';
import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
} from '@nestjs/websockets';
import type { IncomingMessage } from 'http';
import type { RawData } from 'ws';
import { Channel, EnvelopeType, ErrorEnvelope, MessageKind } from '@career-agent/shared/types';
import { errorMessage } from '@career-agent/shared/utils';
import { ConnectionHandle, ConnectionRegistryService } from '@career-agent/agent/connections';
import { ChatService } from '@career-agent/agent/core';
import { DuplexFrame, duplexFrameSchema } from './dto';
import { formatZodIssues } from './pipes/zod-validation.pipe';

/**
 * A ws client as the gateway sees it: a registry handle that emits frames
 */
export interface DuplexClient extends ConnectionHandle {
  on(event: 'message', listener: (data: RawData) => void): unknown;
}

export const POLICY_VIOLATION = 1008;

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export function userIdFromRequest(request: IncomingMessage | undefined): string | null {
  const url = new URL(request?.url ?? '/', 'http://localhost');
  const userId = url.searchParams.get('userId')?.trim();
  return userId ? userId : null;
}

/**
 * Agent Gateway - duplex chat at /ws?userId=<id>
 *
 * Frames: { "agentType": "career_advisor", "message": "...", "conversationId"?: "..." }
 * Each frame gets typing_indicator, agent_response, typing_indicator.
 */
@WebSocketGateway({ path: '/ws' })
export class AgentGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(AgentGateway.name);
  private readonly clients = new WeakMap<DuplexClient, string>();

  constructor(
    private readonly registry: ConnectionRegistryService,
    private readonly chatService: ChatService
  ) {}

  async handleConnection(client: DuplexClient, request?: IncomingMessage): Promise<void> {
    const userId = userIdFromRequest(request);
    if (!userId) {
      this.logger.warn('Rejected duplex connection without userId');
      client.close(POLICY_VIOLATION, 'userId query parameter is required');
      return;
    }

    this.clients.set(client, userId);
    client.on('message', (data) => {
      this.handleFrame(userId, rawDataToString(data)).catch((error) =>
        this.logger.error(`[${userId}] Frame handling failed: ${errorMessage(error)}`)
      );
    });

    try {
      await this.registry.connect(client, userId);
    } catch (error) {
      this.logger.error(`[${userId}] Connection setup failed: ${errorMessage(error)}`);
    }
  }

  handleDisconnect(client: DuplexClient): void {
    const userId = this.clients.get(client);
    if (!userId) {
      return;
    }
    this.clients.delete(client);
    this.registry.disconnect(userId, client);
  }

  async handleFrame(userId: string, raw: string): Promise<void> {
    this.registry.recordInbound(userId);

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      await this.sendError(userId, 'Frame is not valid JSON');
      return;
    }

    const parsed = duplexFrameSchema.safeParse(body);
    if (!parsed.success) {
      await this.sendError(userId, `Invalid frame: ${formatZodIssues(parsed.error).join('; ')}`);
      return;
    }

    const frame: DuplexFrame = parsed.data;
    this.logger.debug(`[${userId}] Frame for ${frame.agentType}`);

    try {
      await this.chatService.handleTurn({
        userId,
        agentType: frame.agentType,
        content: frame.message,
        conversationId: frame.conversationId,
        payload: { kind: MessageKind.TEXT, metadata: { channel: Channel.WEBSOCKET } },
        typingIndicators: true,
      });
    } catch (error) {
      this.logger.error(`[${userId}] Chat turn failed: ${errorMessage(error)}`);
      await this.sendError(userId, errorMessage(error));
    }
  }

  private async sendError(userId: string, message: string): Promise<void> {
    const envelope: ErrorEnvelope = { type: EnvelopeType.ERROR, message };
    await this.registry.send(userId, envelope, { queueIfOffline: false });
  }
}
