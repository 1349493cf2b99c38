import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { LEDGER_UPDATES_EVENT } from '@career-agent/shared/types';
import { errorMessage } from '@career-agent/shared/utils';
import { LEDGER_COLLABORATOR, LedgerCollaborator, LedgerSubmission } from '../interfaces';

/**
 * Forwards external-update descriptors to the ledger collaborator.
 * Runs off the chat path; a ledger failure is logged and never reaches the user.
 */
@Injectable()
export class LedgerForwarderService {
  private readonly logger = new Logger(LedgerForwarderService.name);

  constructor(
    @Inject(LEDGER_COLLABORATOR)
    private readonly ledger: LedgerCollaborator
  ) {}

  @OnEvent(LEDGER_UPDATES_EVENT, { async: true })
  async handleLedgerUpdates(submission: LedgerSubmission): Promise<void> {
    if (submission.updates.length === 0) {
      return;
    }

    try {
      const receipt = await this.ledger.apply(submission);
      this.logger.log(
        `[${submission.conversationId}] Ledger accepted ${receipt.accepted}/${submission.updates.length} ` +
          `updates (submission ${receipt.submissionId})`
      );
    } catch (error) {
      this.logger.error(
        `[${submission.conversationId}] Ledger submission failed: ${errorMessage(error)}`
      );
    }
  }
}
