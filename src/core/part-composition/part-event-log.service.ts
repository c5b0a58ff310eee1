import { Injectable } from '@nestjs/common';
import {
  LedgerTransactionService,
  TransactionParticipant,
} from './ledger-transaction.service';
import {
  PartEvent,
  PartId,
  PartNotification,
} from './part-composition.models';

/**
 * Append-only record of state-change notifications. Notifications raised
 * inside a unit of work are held back until it commits.
 */
@Injectable()
export class PartEventLogService implements TransactionParticipant {
  private readonly events: PartEvent[] = [];
  private staged: PartNotification[] | null = null;
  private eventSequence = 1;

  constructor(transactions: LedgerTransactionService) {
    transactions.enlist(this);
  }

  emit(notification: PartNotification): void {
    if (this.staged) {
      this.staged.push(notification);
      return;
    }

    this.append(notification);
  }

  list(): PartEvent[] {
    return this.events.map((event) => ({ ...event }));
  }

  listForPart(partId: PartId): PartEvent[] {
    return this.events
      .filter((event) => referencesPart(event.notification, partId))
      .reverse()
      .map((event) => ({ ...event }));
  }

  begin(): void {
    this.staged = [];
  }

  commit(): void {
    const staged = this.staged ?? [];
    this.staged = null;
    staged.forEach((notification) => this.append(notification));
  }

  rollback(): void {
    this.staged = null;
  }

  private append(notification: PartNotification): void {
    const sequence = this.eventSequence;
    this.eventSequence += 1;

    this.events.push({
      id: `EVT-${String(sequence).padStart(6, '0')}`,
      sequence,
      timestamp: new Date().toISOString(),
      notification,
    });
  }
}

function referencesPart(notification: PartNotification, partId: PartId) {
  switch (notification.type) {
    case 'OPERATOR_APPROVAL_CHANGED':
      return false;
    case 'PART_ATTACHED':
    case 'PART_DETACHED':
      return (
        notification.assemblyId === partId || notification.partId === partId
      );
    case 'PART_DISASSEMBLED':
      return (
        notification.partId === partId || notification.childIds.includes(partId)
      );
    default:
      return notification.partId === partId;
  }
}
