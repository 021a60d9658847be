import { isoToday, viewsPerDay } from "@votes-vs-views/shared";
import { loadEnv } from "../lib/env";
import { createYouTubeLookup } from "../lib/youtube";

loadEnv();

const videoId = process.argv[2];
const apiKey = process.env.YOUTUBE_API_KEY;

if (!videoId || !apiKey) {
    console.error("Usage: npm run lookup -- <video-id>");
    process.exit(1);
}

const result = await createYouTubeLookup({ apiKey })(videoId);

if (!result.ok) {
    console.error(`Error fetching video data: ${result.message}`);
    process.exit(1);
}

const today = isoToday();
const { stats } = result;

console.log(`Title: ${stats.title}`);
console.log(`Views as of ${today}: ${stats.viewCount}`);
console.log(`Upload Date: ${stats.publishedAt}`);
console.log(`Views per day as of ${today}: ${Math.round(viewsPerDay(stats.viewCount, stats.publishedAt, today))}`);
