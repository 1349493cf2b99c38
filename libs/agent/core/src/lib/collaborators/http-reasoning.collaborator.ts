import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { AgentLimits } from '@career-agent/shared/types';
import {
  ReasoningCollaborator,
  ReasoningRequest,
  ReasoningResult,
} from '../interfaces';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const reasoningResultSchema = z.object({
  summary: z.string(),
  analysis: z.record(z.unknown()).default({}),
  actionItems: z.array(z.string()).default([]),
  confidence: z.number().default(0.5),
  careerPaths: z.array(z.record(z.unknown())).default([]),
  skills: z.array(z.string()).default([]),
  profileUpdates: z
    .array(
      z.object({
        fieldPath: z.string(),
        newValue: z.unknown(),
        reason: z.string(),
      })
    )
    .default([]),
});

/**
 * Reasoning collaborator over an OpenAI-compatible chat-completions API.
 * The model is asked for a JSON object that is validated before use.
 */
@Injectable()
export class HttpReasoningCollaborator implements ReasoningCollaborator {
  private readonly logger = new Logger(HttpReasoningCollaborator.name);
  private readonly client: AxiosInstance;
  private readonly model: string;

  constructor(private readonly config: ConfigService) {
    const apiKey = this.config.get<string>('reasoning.apiKey');
    if (!apiKey) {
      throw new Error('REASONING_API_KEY environment variable is required');
    }

    this.model = this.config.get<string>('reasoning.model', 'gpt-4o-mini');

    this.client = axios.create({
      baseURL: this.config.get<string>('reasoning.apiUrl', 'https://api.openai.com/v1'),
      timeout: this.config.get<number>('reasoning.timeoutMs', AgentLimits.PROCESSING_TIMEOUT),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        if (error.response) {
          const { status } = error.response;
          if (status === 429) {
            throw new Error('Reasoning service rate limit exceeded. Please try again later.');
          } else if (status === 401 || status === 403) {
            throw new Error('Reasoning service rejected the API key. Check REASONING_API_KEY.');
          }
          throw new Error(`Reasoning service error: ${status}`);
        }
        throw error;
      }
    );

    this.logger.log(`Initialized reasoning collaborator (model: ${this.model})`);
  }

  async reason(request: ReasoningRequest): Promise<ReasoningResult> {
    const { agent, message, context } = request;
    const response = await this.client.post('/chat/completions', {
      model: this.model,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: agent.systemPrompt },
        {
          role: 'user',
          content: JSON.stringify({
            message: message.content,
            kind: message.kind,
            metadata: message.metadata,
            attachments: message.attachments,
            conversation: context.conversation,
            profile: context.profile,
          }),
        },
      ],
    });

    const completion = completionSchema.parse(response.data);
    const content = completion.choices[0].message.content;
    if (!content) {
      throw new Error('Reasoning service returned an empty reply');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new Error('Reasoning service returned malformed JSON');
    }

    const result = reasoningResultSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(
        `[${message.conversationId}] Invalid reasoning reply: ${result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ')}`
      );
      throw new Error('Reasoning service reply did not match the expected shape');
    }

    return result.data;
  }
}
