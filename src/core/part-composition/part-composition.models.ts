export type PartId = number;
export type AccountId = string;

export type LockStatus = 'FREE' | 'LOCKED';

export const MAX_CHILDREN = 10;
export const MIN_ASSEMBLY_PARTS = 2;
export const MAX_TREE_DEPTH = 10;

export interface PartRecord {
  id: PartId;
  partNumber: number;
  name: string;
  manufacturer: string;
  lockStatus: LockStatus;
  parentId: PartId | null;
  children: PartId[];
}

export interface PartAttributes {
  partNumber: number;
  name: string;
  manufacturer: string;
  lockStatus: LockStatus;
}

export interface PartRelations {
  parentId: PartId | null;
  children: PartId[];
}

export interface PartDetails extends PartAttributes, PartRelations {
  id: PartId;
  owner: AccountId;
  approved: AccountId | null;
}

export interface PartSummary {
  id: PartId;
  partNumber: number;
  name: string;
  manufacturer: string;
  lockStatus: LockStatus;
  owner: AccountId;
}

export interface PartSearchFilters {
  owner?: string;
  name?: string;
  manufacturer?: string;
  q?: string;
}

export interface MintPartInput {
  owner: AccountId;
  partNumber: number;
  name: string;
  manufacturer: string;
}

export interface AssemblePartsInput {
  partNumber: number;
  name: string;
  manufacturer: string;
  partIds: PartId[];
}

export interface DisassemblyResult {
  assemblyId: PartId;
  releasedPartIds: PartId[];
}

export type DetachResult =
  | { outcome: 'DETACHED'; assemblyId: PartId; partId: PartId }
  | ({ outcome: 'DISASSEMBLED' } & DisassemblyResult);

export interface AssemblyTreeNode {
  part: PartSummary;
  hasChildren: boolean;
  children: AssemblyTreeNode[];
}

export interface AssemblyTreeResponse {
  rootPartId: PartId;
  requestedDepth: number;
  nodeCount: number;
  tree: AssemblyTreeNode;
}

/**
 * Carried down a transfer cascade. Its presence is what lets a locked child
 * move together with the root that started the cascade.
 */
export interface TransferContext {
  cascadeRoot: PartId;
}

export interface TransferRequest {
  partId: PartId;
  from: AccountId;
  to: AccountId;
  cascade: TransferContext | null;
}

export type TransferGuard = (request: TransferRequest) => void;

export type PartNotification =
  | {
      type: 'PART_CREATED';
      owner: AccountId;
      partNumber: number;
      partId: PartId;
    }
  | {
      type: 'PART_ASSEMBLED';
      owner: AccountId;
      partNumber: number;
      partId: PartId;
    }
  | {
      type: 'PART_DISASSEMBLED';
      owner: AccountId;
      partNumber: number;
      partId: PartId;
      childIds: PartId[];
    }
  | {
      type: 'PART_ATTACHED';
      owner: AccountId;
      assemblyId: PartId;
      partId: PartId;
    }
  | {
      type: 'PART_DETACHED';
      owner: AccountId;
      assemblyId: PartId;
      partId: PartId;
    }
  | {
      type: 'PART_TRANSFERRED';
      from: AccountId;
      to: AccountId;
      partId: PartId;
    }
  | {
      type: 'APPROVAL_GRANTED';
      owner: AccountId;
      approved: AccountId;
      partId: PartId;
    }
  | {
      type: 'OPERATOR_APPROVAL_CHANGED';
      owner: AccountId;
      operator: AccountId;
      approved: boolean;
    };


export interface PartEvent {
  id: string;
  sequence: number;
  timestamp: string;
  notification: PartNotification;
}
