// Schema exports
export {
    YouTubeVideoStatsSchema,
    YouTubeVideoListSchema,
    IsoDateSchema,
    VideoObservationSchema,
    SongRecordSchema,
    ReferencePolicySchema,
    ViewsPerDayModeSchema,
    PipelineConfigSchema,
} from "./schemas";

// Type exports
export type {
    YouTubeVideoStats,
    YouTubeVideoList,
    VideoObservation,
    SongRecord,
    EligibleRecord,
    DerivedRecord,
    ReferencePolicy,
    ViewsPerDayMode,
    PipelineConfig,
    Comparison,
} from "./types";

// Error exports
export {
    PipelineError,
    SchemaError,
    ReferenceNotFoundError,
    SourceUnavailableError,
    DivisionError,
    RenderError,
    isPipelineError,
} from "./errors";
export type { PipelineErrorCode } from "./errors";

// Pipeline exports
export {
    resolveViewsPerDay,
    filterCohort,
    selectReference,
    normalize,
    deriveComparison,
} from "./pipeline";

// Utility exports
export { elapsedDays, viewsPerDay, isoToday, formatSigned, formatPercent } from "./utils";
