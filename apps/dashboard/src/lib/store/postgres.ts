import { asc, songs, videoStats, type Database, type Song, type VideoStat } from "@votes-vs-views/db";
import { SourceUnavailableError, type SongRecord, type VideoObservation } from "@votes-vs-views/shared";
import type { RecordStore } from "./types";
import { attachObservations } from "./merge";

const SOURCE = "postgres";

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function toSongRecord(row: Song): SongRecord {
    return {
        identifier: row.youtubeId,
        title: row.title,
        year: row.year,
        voteTotal: row.voteTotal,
        viewsPerDay: row.viewsPerDay,
    };
}

function toObservation(row: VideoStat): VideoObservation {
    return {
        identifier: row.youtubeId,
        title: row.title,
        viewCount: row.viewCount,
        publishedAt: row.publishedAt,
        observedAt: row.observedAt,
        viewsPerDay: row.viewsPerDay,
    };
}

export class PostgresRecordStore implements RecordStore {
    constructor(private readonly db: Database) { }

    async load(): Promise<SongRecord[]> {
        try {
            const songRows = await this.db.select().from(songs).orderBy(asc(songs.id));
            const statRows = await this.db.select().from(videoStats)
                .orderBy(asc(videoStats.observedAt), asc(videoStats.id));

            return attachObservations(songRows.map(toSongRecord), statRows.map(toObservation));
        } catch (error) {
            throw new SourceUnavailableError(SOURCE, `query failed: ${describe(error)}`, { cause: error });
        }
    }

    async appendObservation(observation: VideoObservation): Promise<void> {
        console.log(`Inserting statistics for ${observation.identifier} (${observation.observedAt})`);

        try {
            await this.db.insert(videoStats).values({
                youtubeId: observation.identifier,
                title: observation.title,
                viewCount: observation.viewCount,
                publishedAt: observation.publishedAt,
                observedAt: observation.observedAt,
                viewsPerDay: observation.viewsPerDay,
            });
        } catch (error) {
            throw new SourceUnavailableError(SOURCE, `insert failed: ${describe(error)}`, { cause: error });
        }
    }
}
