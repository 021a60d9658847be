import { z } from "zod";

// ============================================================
// YouTube API Response Schemas (raw from API)
// ============================================================

export const YouTubeVideoStatsSchema = z.object({
    id: z.string(),
    snippet: z.object({
        title: z.string(),
        publishedAt: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
    }),
    statistics: z.object({
        viewCount: z.string().transform(Number).pipe(z.number().int().nonnegative()),
    }),
});

export const YouTubeVideoListSchema = z.object({
    items: z.array(YouTubeVideoStatsSchema).default([]),
});

// ============================================================
// Song Records (after load)
// ============================================================

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const VideoObservationSchema = z.object({
    identifier: z.string().min(1),
    title: z.string(),
    viewCount: z.number().nonnegative(),
    publishedAt: IsoDateSchema,
    observedAt: IsoDateSchema,
    viewsPerDay: z.number().nonnegative(),
});

export const SongRecordSchema = z.object({
    identifier: z.string().min(1).nullable(),
    title: z.string(),
    year: z.number().int().nullable(),
    voteTotal: z.number().nonnegative().nullable(),
    viewsPerDay: z.number().nonnegative().nullable(),
    observation: VideoObservationSchema.optional(),
});

// ============================================================
// Pipeline Configuration
// ============================================================

export const ReferencePolicySchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("max_views") }),
    z.object({ kind: z.literal("by_title"), title: z.string().trim().min(1) }),
]);

export const ViewsPerDayModeSchema = z.enum(["stored", "derived"]);

export const PipelineConfigSchema = z.object({
    cohortYear: z.number().int(),
    reference: ReferencePolicySchema,
    viewsPerDay: ViewsPerDayModeSchema.default("derived"),
});
