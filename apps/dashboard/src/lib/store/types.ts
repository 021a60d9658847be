import type { SongRecord, VideoObservation } from "@votes-vs-views/shared";

/**
 * Durable storage for song records and their remote statistics.
 *
 * Observations are append-only. `load()` attaches the latest observation
 * (by observedAt, later rows winning ties) to each song with that identifier.
 */
export interface RecordStore {
    load(): Promise<SongRecord[]>;
    appendObservation(observation: VideoObservation): Promise<void>;
}
