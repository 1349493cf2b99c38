import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { AgentLimits, ConnectionLimits } from '@career-agent/shared/types';

function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parse<T extends z.ZodTypeAny>(namespace: string, schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ${namespace} configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

const milliseconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const timeout = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const appConfig = registerAs('app', () =>
  parse('app', z.object({ port: z.coerce.number().int().positive().default(3001) }), {
    port: readEnv('PORT'),
  })
);

export const agentsConfig = registerAs('agents', () =>
  parse('agents', z.object({ timeoutMs: timeout(AgentLimits.PROCESSING_TIMEOUT) }), {
    timeoutMs: readEnv('AGENT_TIMEOUT_MS'),
  })
);

export const connectionsConfig = registerAs('connections', () =>
  parse(
    'connections',
    z.object({
      flushDelayMs: milliseconds(ConnectionLimits.QUEUE_FLUSH_DELAY),
      writeTimeoutMs: timeout(ConnectionLimits.WRITE_TIMEOUT),
      maxIdleMinutes: z.coerce.number().positive().default(ConnectionLimits.MAX_IDLE_MINUTES),
    }),
    {
      flushDelayMs: readEnv('QUEUE_FLUSH_DELAY_MS'),
      writeTimeoutMs: readEnv('WS_WRITE_TIMEOUT_MS'),
      maxIdleMinutes: readEnv('WS_MAX_IDLE_MINUTES'),
    }
  )
);

// apiKey stays optional here; the reasoning collaborator refuses to start without it
export const reasoningConfig = registerAs('reasoning', () =>
  parse(
    'reasoning',
    z.object({
      apiUrl: z.string().url().default('https://api.openai.com/v1'),
      apiKey: z.string().optional(),
      model: z.string().default('gpt-4o-mini'),
      timeoutMs: timeout(AgentLimits.PROCESSING_TIMEOUT),
    }),
    {
      apiUrl: readEnv('REASONING_API_URL'),
      apiKey: readEnv('REASONING_API_KEY'),
      model: readEnv('REASONING_MODEL'),
      timeoutMs: readEnv('REASONING_TIMEOUT_MS'),
    }
  )
);

export const ledgerConfig = registerAs('ledger', () =>
  parse(
    'ledger',
    z.object({
      apiUrl: z.string().url().optional(),
      apiKey: z.string().optional(),
    }),
    {
      apiUrl: readEnv('LEDGER_API_URL'),
      apiKey: readEnv('LEDGER_API_KEY'),
    }
  )
);

export default [appConfig, agentsConfig, connectionsConfig, reasoningConfig, ledgerConfig];
