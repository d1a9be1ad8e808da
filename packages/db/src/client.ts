import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_WORKER_POOL = { max: 10 };

function connect(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return { connection, db: drizzle(connection, { schema }) };
}

export type DbClient = ReturnType<typeof connect>["db"];

export interface DbHandle {
  db: DbClient;
  close(): Promise<void>;
}

export function createDbClient(options: DbClientOptions): DbHandle {
  const { connection, db } = connect(options);
  return {
    db,
    close: () => connection.end({ timeout: 5 }),
  };
}
