import type { z } from "zod";
import type {
    YouTubeVideoStatsSchema,
    YouTubeVideoListSchema,
    VideoObservationSchema,
    SongRecordSchema,
    ReferencePolicySchema,
    ViewsPerDayModeSchema,
    PipelineConfigSchema,
} from "./schemas";

// YouTube API types
export type YouTubeVideoStats = z.infer<typeof YouTubeVideoStatsSchema>;
export type YouTubeVideoList = z.infer<typeof YouTubeVideoListSchema>;

// Record types
export type VideoObservation = z.infer<typeof VideoObservationSchema>;
export type SongRecord = z.infer<typeof SongRecordSchema>;

/** A record that passed the cohort filter: both metrics present and positive. */
export type EligibleRecord = SongRecord & {
    year: number;
    voteTotal: number;
    viewsPerDay: number;
};

export type DerivedRecord = EligibleRecord & {
    normalizedViews: number;
    normalizedVotes: number;
    /** normalizedViews - normalizedVotes, in percentage points */
    proportionDifference: number;
};

// Configuration types
export type ReferencePolicy = z.infer<typeof ReferencePolicySchema>;
export type ViewsPerDayMode = z.infer<typeof ViewsPerDayModeSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface Comparison {
    reference: EligibleRecord;
    records: DerivedRecord[];
}
