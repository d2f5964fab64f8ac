import type { QueryResultRow } from "pg";
import { isBlockSortField } from "../interfaces";
import type { Block, BlockStore } from "../interfaces";
import { BlockConflictError, StoreUnavailableError } from "../errors";

// The slice of pg's Pool the store uses.
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class PgBlockStore implements BlockStore {
  constructor(private readonly pool: Queryable) {}

  async insert(block: Block): Promise<void> {
    try {
      await this.pool.query('INSERT INTO blocks (height, block) VALUES ($1, $2)', [block.height, JSON.stringify(block)]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new BlockConflictError(block.height, { cause: error });
      }
      throw this.unavailable(error);
    }
  }

  async count(): Promise<number> {
    const rows = await this.query('SELECT COUNT(*)::int AS count FROM blocks');
    return Number(rows[0]?.count ?? 0);
  }

  async findByHeight(height: number): Promise<Block | null> {
    const rows = await this.query('SELECT block FROM blocks WHERE height = $1', [height]);
    return rows.length > 0 ? rows[0].block : null;
  }

  async findTop(field: string, limit: number): Promise<Block[]> {
    if (!isBlockSortField(field)) return [];

    // field comes from the whitelist above, so it is safe to interpolate
    const rows = await this.query(
      `SELECT block FROM blocks ORDER BY (block->>'${field}')::double precision DESC, height ASC LIMIT $1`,
      [limit],
    );
    return rows.map((row) => row.block);
  }

  async findAll(): Promise<Block[]> {
    const rows = await this.query('SELECT block FROM blocks ORDER BY height');
    return rows.map((row) => row.block);
  }

  async dropAll(): Promise<void> {
    await this.query('DELETE FROM blocks');
  }

  private async query(text: string, values?: unknown[]): Promise<QueryResultRow[]> {
    try {
      const result = await this.pool.query(text, values);
      return result.rows;
    } catch (error) {
      throw this.unavailable(error);
    }
  }

  private unavailable(error: unknown) {
    return new StoreUnavailableError(`Block store query failed: ${String(error)}`, { cause: error });
  }
}
