import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

/**
 * Open the connection pool and wrap it in a drizzle handle.
 * Nothing connects at import time; callers own the returned handle.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  // Managed Postgres commonly requires SSL; local dev typically does not.
  const shouldUseSsl =
    !connectionString.includes("localhost") &&
    !connectionString.includes("127.0.0.1") &&
    !connectionString.includes("0.0.0.0");

  const pool = new pg.Pool({
    connectionString,
    ...(shouldUseSsl ? { ssl: { rejectUnauthorized: false } } : {}),
    max: 10,
    connectionTimeoutMillis: 8000,
    idleTimeoutMillis: 30000,
    keepAlive: true,
  });

  // The pool drops the broken client and opens a new one on next checkout
  pool.on("error", (err) => {
    console.error("[DB Pool] Unexpected error on idle client:", err.message);
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    async close() {
      console.log("[DB Pool] Closing connections...");
      await pool.end();
      console.log("[DB Pool] All connections closed");
    },
  };
}

const CONNECTION_ERROR_CODES = [
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
];

const CONNECTION_ERROR_MESSAGES = [
  "connection terminated",
  "connection reset",
  "connection ended",
  "getaddrinfo",
  "timeout",
];

export function isDatabaseConnectionError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;

  if ("code" in error && typeof error.code === "string" && CONNECTION_ERROR_CODES.includes(error.code)) {
    return true;
  }

  if ("message" in error && typeof error.message === "string") {
    const lower = error.message.toLowerCase();
    if (CONNECTION_ERROR_MESSAGES.some((pattern) => lower.includes(pattern))) {
      return true;
    }
  }

  // AggregateError from a multi-address connect attempt
  if ("errors" in error && Array.isArray(error.errors)) {
    return error.errors.some((inner: unknown) => isDatabaseConnectionError(inner));
  }

  return false;
}
