import { describe, it, expect, vi } from "vitest";
import type { SongRecord, VideoObservation } from "@votes-vs-views/shared";
import { refreshStatistics } from "../lib/refresh";
import { MemoryRecordStore } from "../lib/store/memory";
import type { RecordStore } from "../lib/store/types";
import type { StatLookup } from "../lib/youtube";

function createSong(title: string, identifier: string | null): SongRecord {
    return { identifier, title, year: 2024, voteTotal: 100, viewsPerDay: 10 };
}

const songs = [
    createSong("Paper Moon", "vid-0001"),
    createSong("Night Bus", "vid-0002"),
    createSong("Unlinked", null),
    createSong("Quiet Street", "vid-0003"),
];

const lookup: StatLookup = async (identifier) => {
    if (identifier === "vid-0002") {
        return { ok: false, reason: "not_found", message: `No video found with ID: ${identifier}` };
    }
    return {
        ok: true,
        stats: { identifier, title: `${identifier} MV`, viewCount: 6000, publishedAt: "2024-01-01" },
    };
};

describe("refreshStatistics", () => {
    it("writes successful lookups and skips the failing one", async () => {
        const store = new MemoryRecordStore(songs);

        const summary = await refreshStatistics(songs, { lookup, store, today: "2024-03-01" });

        expect(summary.total).toBe(3);
        expect(summary.updated).toEqual(["vid-0001", "vid-0003"]);
        expect(summary.skipped).toEqual([
            { identifier: "vid-0002", reason: "No video found with ID: vid-0002" },
        ]);
        expect(store.observations).toEqual([
            {
                identifier: "vid-0001",
                title: "vid-0001 MV",
                viewCount: 6000,
                publishedAt: "2024-01-01",
                observedAt: "2024-03-01",
                viewsPerDay: 100,
            },
            {
                identifier: "vid-0003",
                title: "vid-0003 MV",
                viewCount: 6000,
                publishedAt: "2024-01-01",
                observedAt: "2024-03-01",
                viewsPerDay: 100,
            },
        ]);
    });

    it("continues past a lookup that throws", async () => {
        const store = new MemoryRecordStore(songs);
        const throwing: StatLookup = async (identifier) => {
            if (identifier === "vid-0001") throw new Error("socket hang up");
            return lookup(identifier);
        };

        const summary = await refreshStatistics(songs, { lookup: throwing, store, today: "2024-03-01" });

        expect(summary.updated).toEqual(["vid-0003"]);
        expect(summary.skipped.map(s => s.identifier)).toEqual(["vid-0001", "vid-0002"]);
    });

    it("continues past a failed write", async () => {
        const written: VideoObservation[] = [];
        const store: RecordStore = {
            load: async () => songs,
            appendObservation: async (observation) => {
                if (observation.identifier === "vid-0001") throw new Error("disk full");
                written.push(observation);
            },
        };

        const summary = await refreshStatistics(songs, { lookup, store, today: "2024-03-01" });

        expect(summary.skipped).toEqual([
            { identifier: "vid-0001", reason: "disk full" },
            { identifier: "vid-0002", reason: "No video found with ID: vid-0002" },
        ]);
        expect(written.map(o => o.identifier)).toEqual(["vid-0003"]);
    });

    it("looks up one video at a time and reports progress after each", async () => {
        let inFlight = 0;
        let maxInFlight = 0;
        const tracked: StatLookup = async (identifier) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await new Promise(resolve => setTimeout(resolve, 1));
            inFlight--;
            return lookup(identifier);
        };
        const onProgress = vi.fn();

        await refreshStatistics(songs, { lookup: tracked, store: new MemoryRecordStore(songs), today: "2024-03-01", onProgress });

        expect(maxInFlight).toBe(1);
        expect(onProgress.mock.calls).toEqual([
            [1, 3, "vid-0001"],
            [2, 3, "vid-0002"],
            [3, 3, "vid-0003"],
        ]);
    });

    it("makes refreshed views per day visible on the next load", async () => {
        const store = new MemoryRecordStore(songs);
        await refreshStatistics(songs, { lookup, store, today: "2024-03-01" });

        const [first] = await store.load();
        expect(first.observation?.viewsPerDay).toBe(100);
    });
});
