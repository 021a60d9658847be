import { isoToday, viewsPerDay, type SongRecord } from "@votes-vs-views/shared";
import type { RecordStore } from "./store";
import type { StatLookup } from "./youtube";

export interface RefreshOptions {
    lookup: StatLookup;
    store: RecordStore;
    /** Observation date, YYYY-MM-DD. Defaults to today (UTC). */
    today?: string;
    onProgress?: (done: number, total: number, identifier: string) => void;
}

export interface RefreshSummary {
    total: number;
    updated: string[];
    skipped: { identifier: string; reason: string }[];
}

/**
 * Fetch fresh statistics for every linked song, one request at a time, and
 * append each result to the store. A failed lookup or write skips that song
 * and the loop carries on.
 */
export async function refreshStatistics(records: readonly SongRecord[], options: RefreshOptions): Promise<RefreshSummary> {
    const { lookup, store, today = isoToday(), onProgress } = options;

    const identifiers = records
        .map(record => record.identifier)
        .filter((id): id is string => id !== null);

    const summary: RefreshSummary = { total: identifiers.length, updated: [], skipped: [] };

    for (const [index, identifier] of identifiers.entries()) {
        try {
            const result = await lookup(identifier);

            if (result.ok) {
                const { stats } = result;
                await store.appendObservation({
                    identifier,
                    title: stats.title,
                    viewCount: stats.viewCount,
                    publishedAt: stats.publishedAt,
                    observedAt: today,
                    viewsPerDay: viewsPerDay(stats.viewCount, stats.publishedAt, today),
                });
                summary.updated.push(identifier);
            } else {
                console.warn(`⚠️  Skipping ${identifier}: ${result.message}`);
                summary.skipped.push({ identifier, reason: result.message });
            }
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.error(`Error refreshing ${identifier}:`, reason);
            summary.skipped.push({ identifier, reason });
        }

        onProgress?.(index + 1, identifiers.length, identifier);
    }

    return summary;
}
