import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import type { SongRecord } from "@votes-vs-views/shared";
import { runRefresh } from "../commands/refresh";
import { MemoryRecordStore } from "../lib/store/memory";
import type { StatLookup } from "../lib/youtube";

const spinner = vi.hoisted(() => ({
    succeed: vi.fn(),
    fail: vi.fn(),
}));

const ora = vi.hoisted(() => vi.fn(() => ({ start: () => spinner })));

vi.mock("ora", () => ({ default: ora }));

const songs: SongRecord[] = [
    { identifier: "vid-0001", title: "Paper Moon", year: 2024, voteTotal: 100, viewsPerDay: 10 },
    { identifier: null, title: "Unlinked", year: 2024, voteTotal: 100, viewsPerDay: 10 },
    { identifier: "vid-0002", title: "Night Bus", year: 2024, voteTotal: 100, viewsPerDay: 10 },
];

const lookup: StatLookup = async (identifier) => ({
    ok: true,
    stats: { identifier, title: `${identifier} MV`, viewCount: 6000, publishedAt: "2024-01-01" },
});

describe("runRefresh", () => {
    let log: MockInstance<typeof console.log>;

    beforeEach(() => {
        log = vi.spyOn(console, "log").mockImplementation(() => {});
        spinner.succeed.mockClear();
        spinner.fail.mockClear();
        ora.mockClear();
    });

    afterEach(() => {
        log.mockRestore();
    });

    it("starts with a spinner and then refreshes every linked video", async () => {
        const store = new MemoryRecordStore(songs);

        const summary = await runRefresh(songs, { store, createLookup: () => lookup, today: "2024-03-01" });

        expect(ora).toHaveBeenCalledTimes(1);
        expect(spinner.succeed).toHaveBeenCalledTimes(1);
        expect(spinner.succeed.mock.calls[0][0]).toContain("2 linked videos");
        expect(summary?.updated).toEqual(["vid-0001", "vid-0002"]);
        expect(store.observations.map(o => o.viewsPerDay)).toEqual([100, 100]);
    });

    it("fails the spinner and writes nothing when the lookup cannot be created", async () => {
        const store = new MemoryRecordStore(songs);

        const summary = await runRefresh(songs, {
            store,
            createLookup: () => {
                throw new Error("YOUTUBE_API_KEY not set");
            },
        });

        expect(summary).toBeNull();
        expect(spinner.fail).toHaveBeenCalledTimes(1);
        expect(spinner.succeed).not.toHaveBeenCalled();
        expect(store.observations).toEqual([]);
    });
});
