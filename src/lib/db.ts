import { Pool } from 'pg';

/** The slice of `pg` the repositories use; a `Pool` or a `PoolClient` fits. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface Database extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
}

let pool: Pool | null = null;

/** Opens the shared pool and proves it with a round trip. */
export async function openDb(connectionString: string): Promise<Pool> {
  if (!pool) {
    pool = new Pool({
      connectionString,
      connectionTimeoutMillis: 5000,
    });
    pool.on('error', (err: Error) => {
      console.error('[db] idle client error', err.message);
    });
  }
  try {
    await pool.query('select 1');
  } catch (err) {
    await closeDb();
    throw err;
  }
  console.log('[db] connected');
  return pool;
}

export async function closeDb() {
  if (pool) {
    const p = pool;
    pool = null;
    await p.end();
  }
}
