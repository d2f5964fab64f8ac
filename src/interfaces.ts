export interface TransactionInfo {
  sender: string;
  recipient: string;
  amount: number;
}

export interface Transaction {
  transactionId: string;
  transactionInfo: TransactionInfo;
}

// Everything the proof-of-work hashes: the block minus its nonce and timing.
export interface BlockCandidate {
  height: number;
  previousHash: string | null;
  merkleRoot: string | null;
  transactions: Transaction[];
  numberOfTransactions: number;
  difficultyBits: number;
  difficulty: number;
  blockReward: number;
  timestamp: string;
}

export interface Block extends BlockCandidate {
  nonce: number;
  elapsedTime: number;
  hashPower: number;
}

export const BLOCK_SORT_FIELDS = [
  'difficulty',
  'elapsedTime',
  'blockReward',
  'hashPower',
  'height',
  'nonce',
  'numberOfTransactions',
] as const;

export type BlockSortField = (typeof BLOCK_SORT_FIELDS)[number];

export function isBlockSortField(field: string): field is BlockSortField {
  return BLOCK_SORT_FIELDS.some((known) => known === field);
}

const SNAKE_CASE_SORT_FIELDS: Record<string, BlockSortField> = {
  elapsed_time: 'elapsedTime',
  block_reward: 'blockReward',
  hash_power: 'hashPower',
  number_of_transactions: 'numberOfTransactions',
};

// Accepts the camelCase field names and their snake_case spellings.
export function resolveBlockSortField(field: string): BlockSortField | null {
  if (isBlockSortField(field)) return field;
  return Object.hasOwn(SNAKE_CASE_SORT_FIELDS, field) ? SNAKE_CASE_SORT_FIELDS[field] : null;
}

/**
 * Append-only, height-ordered block log. Height is the store's own count at
 * insertion time, so inserts into one chain must not run concurrently.
 * Returned blocks never carry a storage identifier.
 */
export interface BlockStore {
  insert(block: Block): Promise<void>;
  count(): Promise<number>;
  findByHeight(height: number): Promise<Block | null>;
  /** Highest `limit` blocks by `field`, descending. Unknown fields yield `[]`. */
  findTop(field: string, limit: number): Promise<Block[]>;
  findAll(): Promise<Block[]>;
  dropAll(): Promise<void>;
}
