import { Pool } from "pg";

/** The part of a pg client the repositories call. */
export type QueryRunner = {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
};

export function createPool(connectionString: string) {
  return new Pool({ connectionString });
}

export function poolRunner(pool: Pool): QueryRunner {
  return {
    query: (text, params = []) => pool.query(text, params)
  };
}

export async function queryRows(
  client: QueryRunner,
  text: string,
  params: unknown[] = []
): Promise<unknown[]> {
  const { rows } = await client.query(text, params);
  return rows;
}
