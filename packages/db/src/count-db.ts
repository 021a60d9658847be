import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { sql } from "drizzle-orm";
import { getDb } from "./client";
import { songs, videoStats } from "./schema";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from monorepo root
config({ path: resolve(__dirname, "../../../.env") });

async function countDb() {
    const db = getDb();

    try {
        const [songCount] = await db.select({ count: sql<number>`count(*)` }).from(songs);
        const [statCount] = await db.select({ count: sql<number>`count(*)` }).from(videoStats);
        console.log(`📊 Songs: ${songCount?.count ?? 0}, statistics rows: ${statCount?.count ?? 0}`);
    } catch (error) {
        console.error("❌ Error counting records:", error);
        process.exit(1);
    }
}

void countDb();
