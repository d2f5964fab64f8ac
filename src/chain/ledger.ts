import type { FastifyBaseLogger } from 'fastify';
import type { Block, BlockCandidate, BlockStore, Transaction, TransactionInfo } from '../interfaces';
import { resolveBlockSortField } from '../interfaces';
import { NonceNotFoundError } from '../errors';
import type { LedgerConfig } from '../config';
import { hashObject } from './hasher';
import { merkleRoot } from './merkle';
import { findNonce } from './pow';
import { nextBlockReward, nextDifficulty, nextDifficultyBits } from './schedule';

export const COINBASE_SENDER = '00000000000000000000x0';

export type LedgerLogger = Pick<FastifyBaseLogger, 'info' | 'debug'>;

export interface LedgerOptions {
  store: BlockStore;
  config: LedgerConfig;
  logger: LedgerLogger;
  /** Timestamp source for new blocks. */
  now?: () => Date;
  /** Millisecond clock used to time the nonce search. */
  timer?: () => number;
}

export class Ledger {
  private readonly store: BlockStore;
  private readonly config: LedgerConfig;
  private readonly log: LedgerLogger;
  private readonly now: () => Date;
  private readonly timer: () => number;

  private pending: Transaction[] = [];
  private elapsedTime = 0;
  private hashPower = 0;
  // mine() and reset() both read the chain tip and then write; run them one at a time.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.config = options.config;
    this.log = options.logger;
    this.now = options.now ?? (() => new Date());
    this.timer = options.timer ?? (() => performance.now());
  }

  get pendingTransactions(): readonly Transaction[] {
    return this.pending;
  }

  addTransaction(sender: string, recipient: string, amount: number): Transaction {
    const transactionInfo: TransactionInfo = { sender, recipient, amount };
    const transaction: Transaction = { transactionId: hashObject(transactionInfo), transactionInfo };
    this.pending.push(transaction);
    this.log.debug({ transactionId: transaction.transactionId }, 'Transaction added to pending pool');
    return transaction;
  }

  mine(): Promise<Block> {
    return this.exclusive(() => this.mineNextBlock());
  }

  /**
   * Drops every block and seeds a fresh genesis block with nonce 0. Whatever
   * is pending goes into the genesis block, without a reward.
   */
  reset(): Promise<Block> {
    return this.exclusive(async () => {
      const sealed = [...this.pending];
      await this.store.dropAll();
      this.elapsedTime = 0;
      this.hashPower = 0;

      const genesis: Block = {
        ...this.buildCandidate(null, 1, sealed),
        nonce: 0,
        elapsedTime: 0,
        hashPower: 0,
      };
      await this.store.insert(genesis);
      this.pending = this.pending.slice(sealed.length);
      this.log.info({ transactions: sealed.length }, 'Chain reset, genesis block #1 added');
      return genesis;
    });
  }

  length(): Promise<number> {
    return this.store.count();
  }

  async lastBlock(): Promise<Block | null> {
    const length = await this.store.count();
    return length === 0 ? null : this.store.findByHeight(length);
  }

  genesisBlock(): Promise<Block | null> {
    return this.store.findByHeight(1);
  }

  /** Returns null for any height outside `[1, length]`. */
  async getBlock(height: number): Promise<Block | null> {
    if (!Number.isInteger(height) || height < 1) return null;
    if (height > (await this.store.count())) return null;
    return this.store.findByHeight(height);
  }

  latestBlocks(limit: number): Promise<Block[]> {
    return this.store.findTop('height', limit);
  }

  async topBlocks(field: string, limit: number): Promise<Block[]> {
    const sortField = resolveBlockSortField(field);
    if (sortField === null) return [];
    return this.store.findTop(sortField, limit);
  }

  allBlocks(): Promise<Block[]> {
    return this.store.findAll();
  }

  private async mineNextBlock(): Promise<Block> {
    const length = await this.store.count();
    const previous = length === 0 ? null : await this.store.findByHeight(length);
    const height = length + 1;

    // Transactions submitted while the block is being written stay pending.
    const sealed = this.pending.length;
    const reward: Transaction = this.rewardTransaction(nextBlockReward(previous, this.config));
    const candidate = this.buildCandidate(previous, height, [...this.pending, reward]);

    const startedAt = this.timer();
    const result = findNonce(candidate, candidate.difficultyBits, this.config.maxNonce);
    const elapsedTime = (this.timer() - startedAt) / 1000;

    if (!result.found) {
      throw new NonceNotFoundError(height, candidate.difficultyBits, this.config.maxNonce);
    }

    this.elapsedTime = elapsedTime;
    if (elapsedTime > 0) {
      this.hashPower = result.nonce / elapsedTime;
    }

    const block: Block = {
      ...candidate,
      nonce: result.nonce,
      elapsedTime: this.elapsedTime,
      hashPower: this.hashPower,
    };
    await this.store.insert(block);
    this.pending = this.pending.slice(sealed);

    this.log.info(
      { height, nonce: block.nonce, difficultyBits: block.difficultyBits, elapsedTime: block.elapsedTime },
      `Block #${height} added to the chain`,
    );
    return block;
  }

  private buildCandidate(previous: Block | null, height: number, transactions: Transaction[]): BlockCandidate {
    return {
      height,
      previousHash: previous === null ? null : hashObject(previous),
      merkleRoot: merkleRoot(transactions.map((tx) => tx.transactionId)),
      transactions,
      numberOfTransactions: transactions.length,
      difficultyBits: nextDifficultyBits(previous, this.config),
      difficulty: nextDifficulty(previous, this.config),
      blockReward: nextBlockReward(previous, this.config),
      timestamp: this.now().toISOString(),
    };
  }

  private rewardTransaction(amount: number): Transaction {
    const transactionInfo: TransactionInfo = {
      sender: COINBASE_SENDER,
      recipient: this.config.minerAddress,
      amount,
    };
    return { transactionId: hashObject(transactionInfo), transactionInfo };
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The caller sees the failure through `run`; the queue only needs to settle.
    this.queue = run.catch(() => undefined);
    return run;
  }
}
