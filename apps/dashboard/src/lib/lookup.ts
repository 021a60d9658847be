import type { AppConfig } from "./config";
import { createCachedLookup, createYouTubeLookup, type StatLookup } from "./youtube";

/** The configured YouTube lookup, memoized for the session. */
export function createStatLookup(config: AppConfig): StatLookup {
    if (!config.youtubeApiKey) throw new Error("YOUTUBE_API_KEY not set");

    const lookup = createYouTubeLookup({
        apiKey: config.youtubeApiKey,
        timeoutMs: config.lookup.timeoutMs,
    });
    return createCachedLookup(lookup, { ttlMs: config.lookup.cacheTtlMs });
}
