import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import type { Config } from "drizzle-kit";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env from monorepo root
config({ path: resolve(__dirname, "../../.env") });

export default {
    schema: "./src/schema.ts",
    out: "./drizzle",
    dialect: "postgresql",
    dbCredentials: {
        url: process.env.DATABASE_URL ?? "",
    },
} satisfies Config;
