// lib/db/drizzle.ts
import { drizzle, type NeonDatabase } from "drizzle-orm/neon-serverless";
import { neonConfig, Pool } from "@neondatabase/serverless";
import ws from "ws";
import * as schema from "./schema";

// Node 20 has no global WebSocket
neonConfig.webSocketConstructor = ws;

export type Db = NeonDatabase<typeof schema>;

let db: Db | null = null;

/**
 * Shared database handle, created on first use so importing this module never
 * requires DATABASE_URL.
 */
export function getDb(connectionString = process.env.DATABASE_URL): Db {
  if (db) return db;
  if (!connectionString) throw new Error("DATABASE_URL is not set");

  const pool = new Pool({ connectionString });
  db = drizzle(pool, { schema });
  return db;
}
