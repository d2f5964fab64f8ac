import { Pool } from "pg";
import { createTables } from "./schema";

/** Opens a connection pool for the block store and makes sure its table exists. */
export async function openBlockDatabase(databaseUrl: string | undefined): Promise<Pool> {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL must point at the PostgreSQL database holding the chain");
  }

  const pool = new Pool({ connectionString: databaseUrl });
  try {
    await createTables(pool);
  } catch (error) {
    await pool.end();
    throw error;
  }
  return pool;
}
