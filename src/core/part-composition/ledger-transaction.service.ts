import { Injectable, Logger } from '@nestjs/common';

export interface TransactionParticipant {
  begin(): void;
  commit(): void;
  rollback(): void;
}

@Injectable()
export class LedgerTransactionService {
  private readonly logger = new Logger(LedgerTransactionService.name);
  private readonly participants: TransactionParticipant[] = [];
  private depth = 0;

  enlist(participant: TransactionParticipant): void {
    if (!this.participants.includes(participant)) {
      this.participants.push(participant);
    }
  }

  get isActive(): boolean {
    return this.depth > 0;
  }

  /**
   * Runs `work` as one all-or-nothing unit. A run started inside another
   * run joins the outer unit.
   */
  run<T>(label: string, work: () => T): T {
    if (this.depth > 0) {
      this.depth += 1;
      try {
        return work();
      } finally {
        this.depth -= 1;
      }
    }

    this.depth = 1;
    this.participants.forEach((participant) => participant.begin());

    try {
      const result = work();
      this.participants.forEach((participant) => participant.commit());
      return result;
    } catch (error) {
      [...this.participants]
        .reverse()
        .forEach((participant) => participant.rollback());

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rolled back ${label}: ${reason}`);
      throw error;
    } finally {
      this.depth = 0;
    }
  }
}
