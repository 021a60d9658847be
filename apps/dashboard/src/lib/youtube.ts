import { YouTubeVideoListSchema } from "@votes-vs-views/shared";

const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";

export interface VideoStats {
    identifier: string;
    title: string;
    viewCount: number;
    /** First-publish date, YYYY-MM-DD */
    publishedAt: string;
}

export type LookupFailureReason = "not_found" | "transport" | "malformed";

export type LookupResult =
    | { ok: true; stats: VideoStats }
    | { ok: false; reason: LookupFailureReason; message: string };

export type StatLookup = (identifier: string) => Promise<LookupResult>;

export interface YouTubeLookupOptions {
    apiKey: string;
    timeoutMs?: number;
    fetchFn?: typeof fetch;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================
// Video statistics lookup
// ============================================================

/**
 * Lookup for a single video's view count and publish date via videos.list.
 * Every failure comes back as `{ ok: false }`; nothing is thrown.
 */
export function createYouTubeLookup({ apiKey, timeoutMs = 10000, fetchFn = fetch }: YouTubeLookupOptions): StatLookup {
    return async (identifier) => {
        const url = new URL(`${YOUTUBE_API_BASE}/videos`);
        url.searchParams.set("part", "statistics,snippet");
        url.searchParams.set("id", identifier);
        url.searchParams.set("key", apiKey);

        let json: unknown;
        try {
            const response = await fetchFn(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
            if (!response.ok) {
                return {
                    ok: false,
                    reason: response.status === 404 ? "not_found" : "transport",
                    message: `YouTube API error: ${response.status} ${response.statusText}`,
                };
            }
            json = await response.json();
        } catch (error) {
            return { ok: false, reason: "transport", message: `Request for ${identifier} failed: ${describe(error)}` };
        }

        const parsed = YouTubeVideoListSchema.safeParse(json);
        if (!parsed.success) {
            return { ok: false, reason: "malformed", message: `Unexpected response for ${identifier}: ${parsed.error.issues[0]?.message ?? "invalid"}` };
        }

        const video = parsed.data.items[0];
        if (!video) {
            return { ok: false, reason: "not_found", message: `No video found with ID: ${identifier}` };
        }

        return {
            ok: true,
            stats: {
                identifier,
                title: video.snippet.title,
                viewCount: video.statistics.viewCount,
                publishedAt: video.snippet.publishedAt.slice(0, 10),
            },
        };
    };
}

// ============================================================
// Session memo
// ============================================================

export interface CachedLookupOptions {
    ttlMs: number;
    now?: () => number;
}

/**
 * Memoize successful lookups by identifier for `ttlMs`.
 * Failures are not remembered, so the next refresh asks again.
 */
export function createCachedLookup(lookup: StatLookup, { ttlMs, now = Date.now }: CachedLookupOptions): StatLookup {
    const cache = new Map<string, { expiresAt: number; result: LookupResult }>();

    return async (identifier) => {
        const hit = cache.get(identifier);
        if (hit && hit.expiresAt > now()) return hit.result;

        const result = await lookup(identifier);
        if (result.ok && ttlMs > 0) {
            cache.set(identifier, { expiresAt: now() + ttlMs, result });
        } else {
            cache.delete(identifier);
        }
        return result;
    };
}
