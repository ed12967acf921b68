import { Pool } from "pg";
import { getEnv } from "./config/env";

let sharedPool: Pool | null = null;

export function getPool(): Pool {
  if (!sharedPool) {
    const { DATABASE_URL } = getEnv();
    if (!DATABASE_URL) {
      throw new Error("DATABASE_URL is not configured");
    }
    sharedPool = new Pool({ connectionString: DATABASE_URL });
  }
  return sharedPool;
}

export async function closePool() {
  if (sharedPool) {
    await sharedPool.end();
    sharedPool = null;
  }
}
