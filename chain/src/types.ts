export type Hash = string;

export interface Transaction {
  readonly sender: string;
  readonly receiver: string;
  readonly amount: number;
  readonly timestamp: number;
}

export interface BlockHeader {
  index: number;
  timestamp: number;
  previousHash: Hash;
  nonce: number;
  difficulty: number;
}

export interface Block {
  header: BlockHeader;
  transactions: Transaction[];
  hash: Hash;
}

/** A block that has not been mined yet: nonce 0, no hash. */
export type DraftBlock = Omit<Block, 'hash'>;

export type ValidationFailureReason =
  | 'HASH_MISMATCH'
  | 'BROKEN_LINK'
  | 'PROOF_OF_WORK_NOT_MET'
  | 'INDEX_MISMATCH';

export type ValidationResult =
  | { valid: true }
  | {
      valid: false;
      reason: ValidationFailureReason;
      index: number;
      message: string;
    };
