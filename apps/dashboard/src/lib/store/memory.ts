import type { SongRecord, VideoObservation } from "@votes-vs-views/shared";
import type { RecordStore } from "./types";
import { attachObservations } from "./merge";

export class MemoryRecordStore implements RecordStore {
    private readonly songs: SongRecord[];
    private readonly ledger: VideoObservation[];

    constructor(songs: readonly SongRecord[], observations: readonly VideoObservation[] = []) {
        this.songs = songs.map(song => ({ ...song }));
        this.ledger = [...observations];
    }

    get observations(): readonly VideoObservation[] {
        return this.ledger;
    }

    async load(): Promise<SongRecord[]> {
        return attachObservations(this.songs, this.ledger);
    }

    async appendObservation(observation: VideoObservation): Promise<void> {
        this.ledger.push({ ...observation });
    }
}
