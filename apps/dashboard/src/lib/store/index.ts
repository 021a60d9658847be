import { getDb } from "@votes-vs-views/db";
import type { StoreConfig } from "../config";
import type { RecordStore } from "./types";
import { CsvRecordStore } from "./csv";
import { PostgresRecordStore } from "./postgres";

export type { RecordStore } from "./types";
export { CsvRecordStore } from "./csv";
export { PostgresRecordStore } from "./postgres";
export { MemoryRecordStore } from "./memory";

export function createRecordStore(config: StoreConfig): RecordStore {
    switch (config.kind) {
        case "csv":
            return new CsvRecordStore(config.dataPath, config.statsPath);
        case "postgres":
            return new PostgresRecordStore(getDb(config.databaseUrl));
    }
}
