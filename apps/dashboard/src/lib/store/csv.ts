import { readFile, appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import {
    SchemaError,
    SourceUnavailableError,
    VideoObservationSchema,
    type SongRecord,
    type VideoObservation,
} from "@votes-vs-views/shared";
import type { RecordStore } from "./types";
import { attachObservations } from "./merge";

export const SONG_COLUMNS = {
    title: "Title",
    viewsPerDay: "view per day",
    voteTotal: "Total",
    year: "Year",
    identifier: "youtube_id",
} as const;

const REQUIRED_SONG_COLUMNS = [SONG_COLUMNS.title, SONG_COLUMNS.viewsPerDay, SONG_COLUMNS.voteTotal, SONG_COLUMNS.year];

export const LEDGER_COLUMNS = ["youtube_id", "title", "view_count", "published_at", "observed_at", "view per day"] as const;

const CsvTableSchema = z.array(z.array(z.string()));

const NumericCellSchema = z.string().trim().min(1, "is empty").pipe(z.coerce.number());

const LedgerRowSchema = z.object({
    identifier: z.string(),
    title: z.string(),
    viewCount: NumericCellSchema,
    publishedAt: z.string(),
    observedAt: z.string(),
    viewsPerDay: NumericCellSchema,
}).pipe(VideoObservationSchema);

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Blank, non-numeric or negative cells are absent values, not errors. */
function parseMetric(cell: string | undefined): number | null {
    const cleaned = (cell ?? "").trim().replace(/,/g, "");
    if (cleaned === "") return null;
    const value = Number(cleaned);
    return Number.isFinite(value) && value >= 0 ? value : null;
}

// ============================================================
// Raw CSV access
// ============================================================

async function readTable(path: string): Promise<string[][] | null> {
    let content: string;
    try {
        content = await readFile(path, "utf-8");
    } catch (error) {
        if (isMissingFile(error)) return null;
        throw new SourceUnavailableError(path, `cannot read file: ${describe(error)}`, { cause: error });
    }

    try {
        const rows: unknown = parse(content, {
            skip_empty_lines: true,
            relax_column_count: true,
            trim: true,
            bom: true,
        });
        return CsvTableSchema.parse(rows);
    } catch (error) {
        throw new SourceUnavailableError(path, `malformed CSV: ${describe(error)}`, { cause: error });
    }
}

function indexColumns(header: string[]): Map<string, number> {
    return new Map(header.map((name, index) => [name.trim(), index]));
}

// ============================================================
// Songs table
// ============================================================

export async function readSongs(path: string): Promise<SongRecord[]> {
    const table = await readTable(path);
    if (table === null) {
        throw new SourceUnavailableError(path, "file not found");
    }

    const [header = [], ...rows] = table;
    const columns = indexColumns(header);
    const missing = REQUIRED_SONG_COLUMNS.filter(name => !columns.has(name));
    if (missing.length > 0) {
        throw new SchemaError(missing, path);
    }

    const cell = (row: string[], name: string) => {
        const index = columns.get(name);
        return index === undefined ? undefined : row[index];
    };

    return rows.map((row, i) => {
        // a blank year keeps the row but leaves it out of every cohort
        const rawYear = (cell(row, SONG_COLUMNS.year) ?? "").trim();
        const year = rawYear === "" ? null : Number(rawYear);
        if (year !== null && !Number.isInteger(year)) {
            // header is line 1
            throw new SourceUnavailableError(path, `row ${i + 2}: Year "${rawYear}" is not an integer`);
        }

        const identifier = (cell(row, SONG_COLUMNS.identifier) ?? "").trim();

        return {
            identifier: identifier === "" ? null : identifier,
            title: (cell(row, SONG_COLUMNS.title) ?? "").trim(),
            year,
            voteTotal: parseMetric(cell(row, SONG_COLUMNS.voteTotal)),
            viewsPerDay: parseMetric(cell(row, SONG_COLUMNS.viewsPerDay)),
        };
    });
}

// ============================================================
// Observation ledger
// ============================================================

export async function readObservations(path: string): Promise<VideoObservation[]> {
    const table = await readTable(path);
    if (table === null) return [];

    const [header = [], ...rows] = table;
    const columns = indexColumns(header);
    const missing = LEDGER_COLUMNS.filter(name => !columns.has(name));
    if (missing.length > 0) {
        throw new SchemaError(missing, path);
    }

    return rows.map((row, i) => {
        const value = (name: typeof LEDGER_COLUMNS[number]) => {
            const index = columns.get(name);
            return index === undefined ? "" : (row[index] ?? "").trim();
        };

        const parsed = LedgerRowSchema.safeParse({
            identifier: value("youtube_id"),
            title: value("title"),
            viewCount: value("view_count"),
            publishedAt: value("published_at"),
            observedAt: value("observed_at"),
            viewsPerDay: value("view per day"),
        });
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new SourceUnavailableError(path, `row ${i + 2}: ${issue?.path.join(".")} ${issue?.message}`);
        }
        return parsed.data;
    });
}

export function formatObservationRow(observation: VideoObservation, withHeader: boolean): string {
    return stringify([{
        "youtube_id": observation.identifier,
        "title": observation.title,
        "view_count": observation.viewCount,
        "published_at": observation.publishedAt,
        "observed_at": observation.observedAt,
        "view per day": observation.viewsPerDay,
    }], {
        header: withHeader,
        columns: [...LEDGER_COLUMNS],
    });
}

// ============================================================
// Store
// ============================================================

export class CsvRecordStore implements RecordStore {
    constructor(
        private readonly dataPath: string,
        private readonly statsPath: string,
    ) { }

    async load(): Promise<SongRecord[]> {
        const songs = await readSongs(this.dataPath);
        const observations = await readObservations(this.statsPath);
        return attachObservations(songs, observations);
    }

    async appendObservation(observation: VideoObservation): Promise<void> {
        const existing = await readTable(this.statsPath);
        await mkdir(dirname(this.statsPath), { recursive: true });
        await appendFile(this.statsPath, formatObservationRow(observation, existing === null || existing.length === 0), "utf-8");
    }
}
