import pg from "pg";

const { Pool } = pg;

export type DbPool = pg.Pool;

export function createPool(connectionString: string): DbPool {
  return new Pool({ connectionString });
}

export async function ensureSchema(pool: DbPool, statements: readonly string[]) {
  const client = await pool.connect();
  try {
    await client.query("begin");
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query("commit");
  } catch (error) {
    await client.query("rollback");
    throw error;
  } finally {
    client.release();
  }
}

export interface SchemaStore {
  ensureSchema(): Promise<void>;
  close?(): Promise<void>;
}

/** Prepares a module's store; a store whose schema cannot be created is closed before the error propagates. */
export async function openStore<T extends SchemaStore>(store: T): Promise<T> {
  try {
    await store.ensureSchema();
  } catch (error) {
    await store.close?.();
    throw error;
  }
  return store;
}
