import { neon } from "@neondatabase/serverless";
import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import * as schema from "./schema";

export type Database = NeonHttpDatabase<typeof schema>;

// Singleton per process
let db: Database | null = null;

export function getDb(url = process.env.DATABASE_URL): Database {
    if (db) return db;

    if (!url) throw new Error("DATABASE_URL environment variable is not set");

    const client = neon(url);
    db = drizzle(client, { schema });

    return db;
}

// Re-export drizzle operators for convenience
export { eq, desc, asc, inArray, sql, and, or } from "drizzle-orm";
