import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Opened only when snapshots are stored in Postgres; callers own `sql.end()`.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 5 });
  const db = drizzle(sql);
  return { db, sql };
};
