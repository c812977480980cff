import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { config } from "../config/index.js";
import { logger } from "./logger.js";
import * as schema from "../db/schema.js";

export type Database = NodePgDatabase<typeof schema>;

export const pool = new pg.Pool({ connectionString: config.DATABASE_URL });

pool.on("error", (err) => {
  logger.error("PostgreSQL pool error", { error: err.message });
});

export const db: Database = drizzle(pool, {
  schema,
  logger:
    config.NODE_ENV === "development"
      ? {
          logQuery(query: string, params: unknown[]) {
            logger.debug("SQL query", { query, paramCount: params.length });
          },
        }
      : false,
});
