import type { Pool } from "pg";

export async function createTables(pool: Pool) {
  // height doubles as the primary key so two writers cannot seal the same height.
  await pool.query(`
    CREATE TABLE IF NOT EXISTS blocks (
      height INTEGER PRIMARY KEY,
      block JSONB NOT NULL,
      created_at TIMESTAMP DEFAULT NOW()
    );
  `);
}
