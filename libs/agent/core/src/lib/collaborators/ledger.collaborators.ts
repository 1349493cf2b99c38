import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { LedgerCollaborator, LedgerReceipt, LedgerSubmission } from '../interfaces';

const receiptSchema = z.object({
  submissionId: z.string(),
  accepted: z.number().int().nonnegative(),
});

/**
 * Ledger collaborator over the ledger gateway's HTTP API
 */
export class HttpLedgerCollaborator implements LedgerCollaborator {
  private readonly client: AxiosInstance;

  constructor(apiUrl: string, apiKey?: string) {
    this.client = axios.create({
      baseURL: apiUrl,
      timeout: 10000,
      headers: {
        'Content-Type': 'application/json',
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      },
    });
  }

  async apply(submission: LedgerSubmission): Promise<LedgerReceipt> {
    const response = await this.client.post('/updates', submission);
    return receiptSchema.parse(response.data);
  }
}

/**
 * Records submissions in memory; used when no ledger gateway is configured
 */
export class InMemoryLedgerCollaborator implements LedgerCollaborator {
  private readonly logger = new Logger(InMemoryLedgerCollaborator.name);
  private readonly submissions = new Map<string, LedgerSubmission>();

  async apply(submission: LedgerSubmission): Promise<LedgerReceipt> {
    const submissionId = uuidv4();
    this.submissions.set(submissionId, submission);
    this.logger.debug(
      `[${submission.userId}] Recorded ${submission.updates.length} updates as ${submissionId} (${this.submissions.size} held)`
    );
    return { submissionId, accepted: submission.updates.length };
  }
}

export function createLedgerCollaborator(config: ConfigService): LedgerCollaborator {
  const logger = new Logger('LedgerCollaborator');
  const apiUrl = config.get<string>('ledger.apiUrl');

  if (!apiUrl) {
    logger.warn('LEDGER_API_URL not set - external updates are recorded in memory only');
    return new InMemoryLedgerCollaborator();
  }

  logger.log(`Forwarding external updates to ${apiUrl}`);
  return new HttpLedgerCollaborator(apiUrl, config.get<string>('ledger.apiKey'));
}
