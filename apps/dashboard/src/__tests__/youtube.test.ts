import { describe, it, expect, vi } from "vitest";
import { createYouTubeLookup, createCachedLookup, type LookupResult, type StatLookup } from "../lib/youtube";

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }) {
    return new Response(JSON.stringify(body), init);
}

const videoBody = {
    items: [
        {
            id: "vid-0001",
            snippet: { title: "Paper Moon (Official MV)", publishedAt: "2023-11-20T08:00:00Z" },
            statistics: { viewCount: "123456" },
        },
    ],
};

describe("createYouTubeLookup", () => {
    it("returns view count and publish date for a video", async () => {
        const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse(videoBody));
        const lookup = createYouTubeLookup({ apiKey: "test-key", fetchFn });

        const result = await lookup("vid-0001");

        expect(result).toEqual({
            ok: true,
            stats: {
                identifier: "vid-0001",
                title: "Paper Moon (Official MV)",
                viewCount: 123456,
                publishedAt: "2023-11-20",
            },
        });

        const url = new URL(String(fetchFn.mock.calls[0][0]));
        expect(url.pathname).toBe("/youtube/v3/videos");
        expect(url.searchParams.get("part")).toBe("statistics,snippet");
        expect(url.searchParams.get("id")).toBe("vid-0001");
        expect(url.searchParams.get("key")).toBe("test-key");
        expect(fetchFn.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it("reports an unknown video as not_found", async () => {
        const lookup = createYouTubeLookup({ apiKey: "test-key", fetchFn: async () => jsonResponse({ items: [] }) });

        const result = await lookup("missing");

        expect(result).toEqual({ ok: false, reason: "not_found", message: "No video found with ID: missing" });
    });

    it("reports an HTTP error as transport", async () => {
        const lookup = createYouTubeLookup({
            apiKey: "test-key",
            fetchFn: async () => jsonResponse({}, { status: 403, statusText: "Forbidden" }),
        });

        const result = await lookup("vid-0001");

        expect(result).toEqual({ ok: false, reason: "transport", message: "YouTube API error: 403 Forbidden" });
    });

    it("reports a network failure as transport without throwing", async () => {
        const lookup = createYouTubeLookup({
            apiKey: "test-key",
            fetchFn: async () => {
                throw new TypeError("fetch failed");
            },
        });

        const result = await lookup("vid-0001");

        expect(result).toEqual({ ok: false, reason: "transport", message: "Request for vid-0001 failed: fetch failed" });
    });

    it("reports an unexpected payload as malformed", async () => {
        const body = { items: [{ ...videoBody.items[0], statistics: { viewCount: "many" } }] };
        const lookup = createYouTubeLookup({ apiKey: "test-key", fetchFn: async () => jsonResponse(body) });

        const result = await lookup("vid-0001");

        expect(result.ok).toBe(false);
        expect(!result.ok && result.reason).toBe("malformed");
    });
});

describe("createCachedLookup", () => {
    const success: LookupResult = {
        ok: true,
        stats: { identifier: "vid-0001", title: "t", viewCount: 10, publishedAt: "2024-01-01" },
    };

    it("reuses a result inside the staleness window and refetches after it", async () => {
        let clock = 0;
        const inner = vi.fn<StatLookup>(async () => success);
        const lookup = createCachedLookup(inner, { ttlMs: 1000, now: () => clock });

        await lookup("vid-0001");
        clock = 999;
        await lookup("vid-0001");
        expect(inner).toHaveBeenCalledTimes(1);

        clock = 1000;
        await lookup("vid-0001");
        expect(inner).toHaveBeenCalledTimes(2);
    });

    it("keys the memo by identifier", async () => {
        const inner = vi.fn<StatLookup>(async () => success);
        const lookup = createCachedLookup(inner, { ttlMs: 1000, now: () => 0 });

        await lookup("vid-0001");
        await lookup("vid-0002");

        expect(inner.mock.calls.map(call => call[0])).toEqual(["vid-0001", "vid-0002"]);
    });

    it("does not remember failures", async () => {
        const inner = vi.fn<StatLookup>(async () => ({ ok: false, reason: "transport", message: "down" }));
        const lookup = createCachedLookup(inner, { ttlMs: 1000, now: () => 0 });

        await lookup("vid-0001");
        await lookup("vid-0001");

        expect(inner).toHaveBeenCalledTimes(2);
    });
});
