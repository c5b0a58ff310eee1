import { Injectable, Logger } from '@nestjs/common';
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
  AssemblePartsInput,
  AssemblyTreeNode,
  AssemblyTreeResponse,
  DetachResult,
  DisassemblyResult,
  MAX_CHILDREN,
  MAX_TREE_DEPTH,
  MIN_ASSEMBLY_PARTS,
  MintPartInput,
  PartAttributes,
  PartDetails,
  PartId,
  PartRecord,
  PartRelations,
  PartSearchFilters,
  PartSummary,
  TransferRequest,
} from './part-composition.models';
import { OwnershipRegistryService } from './ownership-registry.service';
import { PartEventLogService } from './part-event-log.service';
import { UndoJournal } from './undo-journal';

export type AuthorizationResult =
  | { ok: true }
  | { ok: false; deniedPartIds: PartId[] };

type OwnerResolution =
  | { ok: true; owner: AccountId }
  | { ok: false; owners: AccountId[] };

interface CatalogAttributes {
  partNumber: number;
  name: string;
  manufacturer: string;
}

const clonePart = (part: PartRecord): PartRecord => ({
  ...part,
  children: [...part.children],
});

@Injectable()
export class PartCompositionEngine implements TransactionParticipant {
  private readonly logger = new Logger(PartCompositionEngine.name);

  private readonly partsById = new Map<PartId, PartRecord>();
  private readonly partJournal = new UndoJournal(this.partsById, clonePart);

  private partIdSequence = 1;
  private partIdCheckpoint = 1;

  constructor(
    private readonly registry: OwnershipRegistryService,
    private readonly eventLog: PartEventLogService,
    private readonly transactions: LedgerTransactionService,
  ) {
    transactions.enlist(this);
    registry.setTransferGuard((request) => this.guardTransfer(request));
  }

  mint(input: MintPartInput): PartId {
    const attributes = this.normalizeAttributes(input);
    const owner = input.owner.trim();
    if (!owner) {
      throw invalidInput('Owner account is required.');
    }

    const part = this.transactions.run('mint', () =>
      this.createPart(owner, attributes),
    );

    this.logger.log(`Minted part ${part.id} (${part.name}) for '${owner}'.`);
    return part.id;
  }

  assemble(caller: AccountId, input: AssemblePartsInput): PartId {
    const attributes = this.normalizeAttributes(input);
    const { partIds } = input;

    if (
      partIds.length < MIN_ASSEMBLY_PARTS ||
      partIds.length > MAX_CHILDREN
    ) {
      throw invalidInput(
        `An assembly takes between ${MIN_ASSEMBLY_PARTS} and ${MAX_CHILDREN} parts; received ${partIds.length}.`,
      );
    }

    this.assertDistinct(partIds);
    const parts = partIds.map((partId) => this.requirePart(partId));
    this.assertAuthorized(caller, partIds);
    parts.forEach((part) => this.assertFree(part));
    const owner = this.requireCommonOwner(partIds);

    const assembly = this.transactions.run(
      `assembly of parts ${partIds.join(', ')}`,
      () => {
        const created = this.createPart(owner, attributes);
        parts.forEach((part) => this.lockUnder(part, created));

        this.eventLog.emit({
          type: 'PART_ASSEMBLED',
          owner,
          partNumber: created.partNumber,
          partId: created.id,
        });

        return created;
      },
    );

    this.logger.log(
      `Assembled part ${assembly.id} from parts ${partIds.join(', ')}.`,
    );
    return assembly.id;
  }

  disassemble(caller: AccountId, partId: PartId): DisassemblyResult {
    const assembly = this.requirePart(partId);
    this.assertAuthorized(caller, [partId]);
    this.assertFree(assembly);

    if (assembly.children.length === 0) {
      throw invalidState(`Part ${partId} has no children to release.`);
    }

    return this.transactions.run(`disassembly of part ${partId}`, () =>
      this.dismantle(assembly),
    );
  }

  attach(caller: AccountId, assemblyId: PartId, partIds: PartId[]): void {
    if (partIds.length === 0) {
      throw invalidInput('At least one part id is required.');
    }

    if (partIds.includes(assemblyId)) {
      throw invalidInput(`Part ${assemblyId} cannot be attached to itself.`);
    }

    this.assertDistinct(partIds);
    const assembly = this.requirePart(assemblyId);
    const parts = partIds.map((partId) => this.requirePart(partId));
    this.assertAuthorized(caller, [assemblyId, ...partIds]);
    this.assertFree(assembly);

    if (assembly.children.length === 0) {
      throw invalidState(`Part ${assemblyId} is not an assembly.`);
    }

    parts.forEach((part) => this.assertFree(part));

    if (assembly.children.length + partIds.length > MAX_CHILDREN) {
      throw invalidInput(
        `Assembly ${assemblyId} holds ${assembly.children.length} parts; attaching ${partIds.length} more exceeds the limit of ${MAX_CHILDREN}.`,
      );
    }

    const owner = this.requireCommonOwner(partIds);
    const assemblyOwner = this.registry.currentOwner(assemblyId);
    if (owner !== assemblyOwner) {
      throw ownerMismatch(
        `Parts owned by '${owner}' cannot join assembly ${assemblyId} owned by '${assemblyOwner}'.`,
      );
    }

    this.transactions.run(`attach to assembly ${assemblyId}`, () => {
      for (const part of parts) {
        this.lockUnder(part, assembly);
        this.eventLog.emit({
          type: 'PART_ATTACHED',
          owner,
          assemblyId,
          partId: part.id,
        });
      }
    });

    this.logger.log(
      `Attached parts ${partIds.join(', ')} to assembly ${assemblyId}.`,
    );
  }

  /**
   * Removes one child. An assembly down to its last two children is taken
   * apart entirely rather than left holding a single part.
   */
  detach(
    caller: AccountId,
    assemblyId: PartId,
    partId: PartId,
  ): DetachResult {
    const assembly = this.requirePart(assemblyId);
    const part = this.requirePart(partId);
    this.assertAuthorized(caller, [assemblyId, partId]);
    this.assertFree(assembly);

    const index = assembly.children.indexOf(partId);
    if (index === -1) {
      throw notFound(
        `Part ${partId} is not a child of assembly ${assemblyId}.`,
      );
    }

    if (assembly.children.length === MIN_ASSEMBLY_PARTS) {
      const result = this.transactions.run(
        `detach collapsing assembly ${assemblyId}`,
        () => this.dismantle(assembly),
      );
      return { outcome: 'DISASSEMBLED', ...result };
    }

    const owner = this.registry.currentOwner(assemblyId);
    this.transactions.run(`detach from assembly ${assemblyId}`, () => {
      this.partJournal.record(assemblyId);
      this.partJournal.record(partId);

      const last = assembly.children.length - 1;
      assembly.children[index] = assembly.children[last];
      assembly.children.pop();

      part.lockStatus = 'FREE';
      part.parentId = null;

      this.eventLog.emit({ type: 'PART_DETACHED', owner, assemblyId, partId });
    });

    this.logger.log(`Detached part ${partId} from assembly ${assemblyId}.`);
    return { outcome: 'DETACHED', assemblyId, partId };
  }

  transfer(
    caller: AccountId,
    partId: PartId,
    to: AccountId,
    from?: AccountId,
  ): void {
    this.requirePart(partId);
    const owner = from ?? this.registry.currentOwner(partId);

    this.transactions.run(`transfer of part ${partId}`, () =>
      this.registry.transferFrom(caller, owner, to, partId),
    );

    this.logger.log(`Transferred part ${partId} from '${owner}' to '${to}'.`);
  }

  authorize(caller: AccountId, partIds: PartId[]): AuthorizationResult {
    const deniedPartIds = partIds.filter(
      (partId) => !this.registry.isAuthorized(caller, partId),
    );

    return deniedPartIds.length === 0
      ? { ok: true }
      : { ok: false, deniedPartIds };
  }

  getAttributes(partId: PartId): PartAttributes {
    const part = this.requirePart(partId);
    return {
      partNumber: part.partNumber,
      name: part.name,
      manufacturer: part.manufacturer,
      lockStatus: part.lockStatus,
    };
  }

  getRelations(partId: PartId): PartRelations {
    const part = this.requirePart(partId);
    return { parentId: part.parentId, children: [...part.children] };
  }

  getPart(partId: PartId): PartDetails {
    return {
      id: partId,
      ...this.getAttributes(partId),
      ...this.getRelations(partId),
      owner: this.registry.currentOwner(partId),
      approved: this.registry.getApproved(partId),
    };
  }

  searchParts(filters: PartSearchFilters): PartSummary[] {
    const byOwner = filters.owner?.trim();
    const byName = filters.name?.trim().toLowerCase();
    const byManufacturer = filters.manufacturer?.trim().toLowerCase();
    const byAny = filters.q?.trim().toLowerCase();

    return [...this.partsById.values()]
      .map((part) => this.toPartSummary(part))
      .filter((summary) => {
        const ownerMatch = !byOwner || summary.owner === byOwner;
        const nameMatch =
          !byName || summary.name.toLowerCase().includes(byName);
        const manufacturerMatch =
          !byManufacturer ||
          summary.manufacturer.toLowerCase().includes(byManufacturer);
        const anyMatch =
          !byAny ||
          summary.name.toLowerCase().includes(byAny) ||
          summary.manufacturer.toLowerCase().includes(byAny) ||
          String(summary.partNumber).includes(byAny);

        return ownerMatch && nameMatch && manufacturerMatch && anyMatch;
      })
      .sort((left, right) => left.id - right.id);
  }

  getAssemblyTree(rootPartId: PartId, depth = 1): AssemblyTreeResponse {
    this.requirePart(rootPartId);

    if (!Number.isInteger(depth) || depth < 0) {
      throw invalidInput('Depth must be an integer >= 0.');
    }

    if (depth > MAX_TREE_DEPTH) {
      throw invalidInput(
        `Expand limit exceeded. Maximum supported depth is ${MAX_TREE_DEPTH}.`,
      );
    }

    let nodeCount = 0;

    const buildNode = (
      partId: PartId,
      currentDepth: number,
    ): AssemblyTreeNode => {
      nodeCount += 1;

      const part = this.requirePart(partId);
      const children =
        currentDepth < depth
          ? part.children.map((childId) =>
              buildNode(childId, currentDepth + 1),
            )
          : [];

      return {
        part: this.toPartSummary(part),
        hasChildren: part.children.length > 0,
        children,
      };
    };

    const tree = buildNode(rootPartId, 0);

    return { rootPartId, requestedDepth: depth, nodeCount, tree };
  }

  begin(): void {
    this.partJournal.begin();
    this.partIdCheckpoint = this.partIdSequence;
  }

  commit(): void {
    this.partJournal.commit();
  }

  rollback(): void {
    this.partJournal.rollback();
    this.partIdSequence = this.partIdCheckpoint;
  }

  /**
   * Pre-transfer hook. A locked part may only move as part of a cascade
   * started at its root; a free part drags its whole subtree along.
   */
  private guardTransfer({ partId, from, to, cascade }: TransferRequest): void {
    const part = this.requirePart(partId);

    if (part.lockStatus === 'LOCKED' && cascade === null) {
      throw invalidState(
        `Part ${partId} is locked inside assembly ${part.parentId} and only moves with it.`,
      );
    }

    const context = cascade ?? { cascadeRoot: partId };
    for (const childId of part.children) {
      this.logger.debug(
        `Cascading part ${childId} to '${to}' (root ${context.cascadeRoot}).`,
      );
      this.registry.recordTransfer(childId, from, to, context);
    }
  }

  private createPart(
    owner: AccountId,
    attributes: CatalogAttributes,
  ): PartRecord {
    const part: PartRecord = {
      id: this.allocatePartId(),
      ...attributes,
      lockStatus: 'FREE',
      parentId: null,
      children: [],
    };

    this.partJournal.record(part.id);
    this.partsById.set(part.id, part);
    this.registry.recordCreate(part.id, owner);

    this.eventLog.emit({
      type: 'PART_CREATED',
      owner,
      partNumber: part.partNumber,
      partId: part.id,
    });

    return part;
  }

  private dismantle(assembly: PartRecord): DisassemblyResult {
    const owner = this.registry.currentOwner(assembly.id);
    const releasedPartIds = [...assembly.children];

    for (const childId of releasedPartIds) {
      const child = this.requirePart(childId);
      this.partJournal.record(childId);
      child.lockStatus = 'FREE';
      child.parentId = null;
    }

    this.partJournal.record(assembly.id);
    this.partsById.delete(assembly.id);
    this.registry.recordDestroy(assembly.id);

    this.eventLog.emit({
      type: 'PART_DISASSEMBLED',
      owner,
      partNumber: assembly.partNumber,
      partId: assembly.id,
      childIds: [...releasedPartIds],
    });

    this.logger.log(
      `Disassembled part ${assembly.id}; released parts ${releasedPartIds.join(', ')}.`,
    );
    return {
      assemblyId: assembly.id,
      releasedPartIds: [...releasedPartIds],
    };
  }

  private lockUnder(part: PartRecord, parent: PartRecord): void {
    this.partJournal.record(part.id);
    this.partJournal.record(parent.id);

    part.lockStatus = 'LOCKED';
    part.parentId = parent.id;
    parent.children.push(part.id);
  }

  private requirePart(partId: PartId): PartRecord {
    const part = this.partsById.get(partId);
    if (!part) {
      throw notFound(`Part ${partId} was not found.`);
    }

    return part;
  }

  private assertFree(part: PartRecord): void {
    if (part.lockStatus === 'LOCKED') {
      throw invalidState(
        `Part ${part.id} is locked inside assembly ${part.parentId}.`,
      );
    }
  }

  private assertDistinct(partIds: PartId[]): void {
    if (new Set(partIds).size !== partIds.length) {
      throw invalidInput('Part ids must not repeat.');
    }
  }

  private assertAuthorized(caller: AccountId, partIds: PartId[]): void {
    const result = this.authorize(caller, partIds);
    if (!result.ok) {
      throw unauthorized(
        `Account '${caller}' is not authorized on parts ${result.deniedPartIds.join(', ')}.`,
      );
    }
  }

  private resolveCommonOwner(partIds: PartId[]): OwnerResolution {
    const owners = [
      ...new Set(partIds.map((partId) => this.registry.currentOwner(partId))),
    ];

    return owners.length === 1
      ? { ok: true, owner: owners[0] }
      : { ok: false, owners };
  }

  private requireCommonOwner(partIds: PartId[]): AccountId {
    const resolution = this.resolveCommonOwner(partIds);
    if (!resolution.ok) {
      throw ownerMismatch(
        `Parts ${partIds.join(', ')} do not share one owner (${resolution.owners.join(', ')}).`,
      );
    }

    return resolution.owner;
  }

  private normalizeAttributes(input: CatalogAttributes): CatalogAttributes {
    if (!Number.isSafeInteger(input.partNumber) || input.partNumber <= 0) {
      throw invalidInput('Part number must be a positive integer.');
    }

    const name = input.name.trim();
    if (!name) {
      throw invalidInput('Part name is required.');
    }

    const manufacturer = input.manufacturer.trim();
    if (!manufacturer) {
      throw invalidInput('Manufacturer is required.');
    }

    return { partNumber: input.partNumber, name, manufacturer };
  }

  private toPartSummary(part: PartRecord): PartSummary {
    return {
      id: part.id,
      partNumber: part.partNumber,
      name: part.name,
      manufacturer: part.manufacturer,
      lockStatus: part.lockStatus,
      owner: this.registry.currentOwner(part.id),
    };
  }

  private allocatePartId(): PartId {
    const id = this.partIdSequence;
    this.partIdSequence += 1;
    return id;
  }
}
