import { Injectable } from '@nestjs/common';
import {
  LedgerTransactionService,
  TransactionParticipant,
} from './ledger-transaction.service';
import {
  invalidInput,
  invalidState,
  notFound,
  ownerMismatch,
  unauthorized,
} from './part-composition.errors';
import {
  AccountId,
  PartId,
  TransferContext,
  TransferGuard,
} from './part-composition.models';
import { PartEventLogService } from './part-event-log.service';
import { UndoJournal } from './undo-journal';

/**
 * Holds the id → owner relation and the approvals granted over it. Every
 * ownership change passes through the registered transfer guard first and
 * only lands if the guard returns.
 */
@Injectable()
export class OwnershipRegistryService implements TransactionParticipant {
  private readonly ownerByPartId = new Map<PartId, AccountId>();
  private readonly approvedByPartId = new Map<PartId, AccountId>();
  private readonly operatorsByOwner = new Map<AccountId, Set<AccountId>>();

  private readonly ownerJournal = new UndoJournal(
    this.ownerByPartId,
    (owner) => owner,
  );
  private readonly approvalJournal = new UndoJournal(
    this.approvedByPartId,
    (approved) => approved,
  );
  private readonly operatorJournal = new UndoJournal(
    this.operatorsByOwner,
    (operators) => new Set(operators),
  );

  private transferGuard: TransferGuard | null = null;

  constructor(
    private readonly transactions: LedgerTransactionService,
    private readonly eventLog: PartEventLogService,
  ) {
    transactions.enlist(this);
  }

  setTransferGuard(guard: TransferGuard): void {
    this.transferGuard = guard;
  }

  exists(partId: PartId): boolean {
    return this.ownerByPartId.has(partId);
  }

  currentOwner(partId: PartId): AccountId {
    const owner = this.ownerByPartId.get(partId);
    if (owner === undefined) {
      throw notFound(`Part ${partId} has no owner of record.`);
    }

    return owner;
  }

  isAuthorized(caller: AccountId, partId: PartId): boolean {
    const owner = this.ownerByPartId.get(partId);
    if (owner === undefined) {
      return false;
    }

    return (
      caller === owner ||
      this.approvedByPartId.get(partId) === caller ||
      this.isApprovedForAll(owner, caller)
    );
  }

  getApproved(partId: PartId): AccountId | null {
    this.currentOwner(partId);
    return this.approvedByPartId.get(partId) ?? null;
  }

  isApprovedForAll(owner: AccountId, operator: AccountId): boolean {
    return this.operatorsByOwner.get(owner)?.has(operator) ?? false;
  }

  balanceOf(owner: AccountId): number {
    return this.partsOwnedBy(owner).length;
  }

  partsOwnedBy(owner: AccountId): PartId[] {
    return [...this.ownerByPartId.entries()]
      .filter(([, holder]) => holder === owner)
      .map(([partId]) => partId)
      .sort((left, right) => left - right);
  }

  recordCreate(partId: PartId, account: AccountId): void {
    const owner = account.trim();
    if (!owner) {
      throw invalidInput('Owner account is required.');
    }

    if (this.ownerByPartId.has(partId)) {
      throw invalidState(`Part ${partId} already has an owner of record.`);
    }

    this.journal(partId);
    this.ownerByPartId.set(partId, owner);
  }

  recordDestroy(partId: PartId): void {
    this.currentOwner(partId);

    this.journal(partId);
    this.ownerByPartId.delete(partId);
    this.approvedByPartId.delete(partId);
  }

  /**
   * Moves a single id. The guard sees the request before anything changes;
   * it may in turn move other ids through this same method.
   */
  recordTransfer(
    partId: PartId,
    from: AccountId,
    to: AccountId,
    cascade: TransferContext | null = null,
  ): void {
    const owner = this.currentOwner(partId);
    if (owner !== from) {
      throw ownerMismatch(
        `Part ${partId} is owned by '${owner}', not '${from}'.`,
      );
    }

    this.transferGuard?.({ partId, from, to, cascade });

    this.journal(partId);
    this.ownerByPartId.set(partId, to);
    this.approvedByPartId.delete(partId);

    this.eventLog.emit({ type: 'PART_TRANSFERRED', from, to, partId });
  }

  transferFrom(
    caller: AccountId,
    from: AccountId,
    to: AccountId,
    partId: PartId,
  ): void {
    const recipient = to.trim();
    if (!recipient) {
      throw invalidInput('Transfer recipient is required.');
    }

    this.currentOwner(partId);
    if (!this.isAuthorized(caller, partId)) {
      throw unauthorized(
        `Account '${caller}' may not transfer part ${partId}.`,
      );
    }

    this.transactions.run(`transfer of part ${partId}`, () =>
      this.recordTransfer(partId, from, recipient),
    );
  }

  approve(caller: AccountId, account: AccountId, partId: PartId): void {
    const owner = this.currentOwner(partId);
    const approved = account.trim();

    if (!approved) {
      throw invalidInput('Approved account is required.');
    }

    if (approved === owner) {
      throw invalidInput('An owner cannot be approved for its own part.');
    }

    if (caller !== owner && !this.isApprovedForAll(owner, caller)) {
      throw unauthorized(
        `Account '${caller}' may not grant approval on part ${partId}.`,
      );
    }

    this.journal(partId);
    this.approvedByPartId.set(partId, approved);

    this.eventLog.emit({ type: 'APPROVAL_GRANTED', owner, approved, partId });
  }

  setApprovalForAll(
    owner: AccountId,
    account: AccountId,
    approved: boolean,
  ): void {
    const operator = account.trim();
    if (!operator) {
      throw invalidInput('Operator account is required.');
    }

    if (owner === operator) {
      throw invalidInput('An account cannot be its own operator.');
    }

    this.operatorJournal.record(owner);
    const operators = this.operatorsByOwner.get(owner) ?? new Set<AccountId>();
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }

    if (operators.size === 0) {
      this.operatorsByOwner.delete(owner);
    } else {
      this.operatorsByOwner.set(owner, operators);
    }

    this.eventLog.emit({
      type: 'OPERATOR_APPROVAL_CHANGED',
      owner,
      operator,
      approved,
    });
  }

  begin(): void {
    this.ownerJournal.begin();
    this.approvalJournal.begin();
    this.operatorJournal.begin();
  }

  commit(): void {
    this.ownerJournal.commit();
    this.approvalJournal.commit();
    this.operatorJournal.commit();
  }

  rollback(): void {
    this.ownerJournal.rollback();
    this.approvalJournal.rollback();
    this.operatorJournal.rollback();
  }

  private journal(partId: PartId): void {
    this.ownerJournal.record(partId);
    this.approvalJournal.record(partId);
  }
}
