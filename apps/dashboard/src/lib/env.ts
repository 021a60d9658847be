import { config } from "dotenv";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let isLoaded = false;

/**
 * Loads the .env file from the monorepo root, then from the working directory.
 * Can be called multiple times safely.
 */
export function loadEnv() {
    if (isLoaded) return;

    // apps/dashboard/src/lib/env.ts -> repository root
    config({ path: join(__dirname, "../../../../.env") });
    config();

    isLoaded = true;
}
