// Schema exports
export { songs, videoStats } from "./schema";
export type { Song, NewSong, VideoStat, NewVideoStat } from "./schema";

// Client exports
export { getDb, eq, desc, asc, inArray, sql, and, or } from "./client";
export type { Database } from "./client";
