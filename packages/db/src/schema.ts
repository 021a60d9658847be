import { pgTable, text, integer, real, timestamp, serial, bigint, index } from 'drizzle-orm/pg-core';

export const songs = pgTable('songs', {
    id: serial('id').primaryKey(),
    youtubeId: text('youtube_id'),
    title: text('title').notNull(),
    year: integer('year').notNull(),

    // Metrics
    voteTotal: real('vote_total'),
    viewsPerDay: real('views_per_day'),

    createdAt: timestamp('created_at').defaultNow(),
});

// Append-only: one row per refresh, the latest observed_at wins on read
export const videoStats = pgTable('video_stats', {
    id: serial('id').primaryKey(),
    youtubeId: text('youtube_id').notNull(),
    title: text('title').notNull(),
    viewCount: bigint('view_count', { mode: 'number' }).notNull(),
    publishedAt: text('published_at').notNull(),
    observedAt: text('observed_at').notNull(),
    viewsPerDay: real('views_per_day').notNull(),

    createdAt: timestamp('created_at').defaultNow(),
}, (table) => ({
    byVideo: index('video_stats_youtube_id_idx').on(table.youtubeId, table.observedAt),
}));

// Type inference for queries
export type Song = typeof songs.$inferSelect;
export type NewSong = typeof songs.$inferInsert;
export type VideoStat = typeof videoStats.$inferSelect;
export type NewVideoStat = typeof videoStats.$inferInsert;
