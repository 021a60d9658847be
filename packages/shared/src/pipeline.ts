import type {
    SongRecord,
    EligibleRecord,
    DerivedRecord,
    ReferencePolicy,
    ViewsPerDayMode,
    PipelineConfig,
    Comparison,
} from "./types";
import { SchemaError, ReferenceNotFoundError, DivisionError } from "./errors";
import { viewsPerDay } from "./utils";

const REQUIRED_FIELDS = ["title", "year", "voteTotal", "viewsPerDay"] as const;

// ============================================================
// Views per day
// ============================================================

/**
 * Pick the views-per-day value each record is analysed with.
 *
 * In "derived" mode a record that carries a remote observation gets
 * raw views ÷ elapsed days since publish; records without one keep the
 * precomputed column. "stored" mode always keeps the column.
 */
export function resolveViewsPerDay(records: readonly SongRecord[], mode: ViewsPerDayMode): SongRecord[] {
    return records.map(record => {
        const observation = record.observation;
        if (mode === "derived" && observation) {
            return {
                ...record,
                viewsPerDay: viewsPerDay(observation.viewCount, observation.publishedAt, observation.observedAt),
            };
        }
        return { ...record };
    });
}

// ============================================================
// Cohort filter
// ============================================================

function assertRecordShape(records: readonly SongRecord[]) {
    records.forEach((record, index) => {
        const missing = REQUIRED_FIELDS.filter(field => !(field in record));
        if (missing.length > 0) {
            throw new SchemaError(missing, `record #${index}`);
        }
    });
}

function isEligible(record: SongRecord, year: number): record is EligibleRecord {
    return record.year === year
        && record.voteTotal !== null && record.voteTotal > 0
        && record.viewsPerDay !== null && record.viewsPerDay > 0;
}

/**
 * Records of the cohort year with both metrics present and positive,
 * sorted by views per day descending. Ties keep their input order.
 */
export function filterCohort(records: readonly SongRecord[], year: number): EligibleRecord[] {
    assertRecordShape(records);

    return records
        .filter((record): record is EligibleRecord => isEligible(record, year))
        .map(record => ({ ...record }))
        .sort((a, b) => b.viewsPerDay - a.viewsPerDay);
}

// ============================================================
// Reference selection
// ============================================================

export function selectReference(eligible: readonly EligibleRecord[], policy: ReferencePolicy): EligibleRecord {
    if (policy.kind === "max_views") {
        const [first, ...rest] = eligible;
        if (!first) {
            throw new ReferenceNotFoundError("No eligible records to pick a max_views reference from");
        }
        return rest.reduce((best, record) => record.viewsPerDay > best.viewsPerDay ? record : best, first);
    }

    const wanted = policy.title.trim();
    const matches = eligible.filter(record => record.title.trim() === wanted);

    if (matches.length === 0) {
        throw new ReferenceNotFoundError(`No eligible record titled "${wanted}"`);
    }
    if (matches.length > 1) {
        throw new ReferenceNotFoundError(`Reference title "${wanted}" matches ${matches.length} records`);
    }
    return matches[0];
}

// ============================================================
// Normalization
// ============================================================

export function normalize(eligible: readonly EligibleRecord[], reference: EligibleRecord): DerivedRecord[] {
    const referenceViews = reference.viewsPerDay;
    const referenceVotes = reference.voteTotal;

    if (referenceViews === 0 || !Number.isFinite(referenceViews)) {
        throw new DivisionError(`Reference "${reference.title}" has unusable views per day: ${referenceViews}`);
    }
    if (referenceVotes === 0 || !Number.isFinite(referenceVotes)) {
        throw new DivisionError(`Reference "${reference.title}" has unusable vote total: ${referenceVotes}`);
    }

    return eligible.map(record => {
        const normalizedViews = (record.viewsPerDay / referenceViews) * 100;
        const normalizedVotes = (record.voteTotal / referenceVotes) * 100;

        return {
            ...record,
            normalizedViews,
            normalizedVotes,
            proportionDifference: normalizedViews - normalizedVotes,
        };
    });
}

// ============================================================
// Full pipeline
// ============================================================

export function deriveComparison(records: readonly SongRecord[], config: PipelineConfig): Comparison {
    const resolved = resolveViewsPerDay(records, config.viewsPerDay);
    const eligible = filterCohort(resolved, config.cohortYear);

    console.log(`Number of songs with complete data: ${eligible.length}`);
    console.log(`Songs included in analysis: ${eligible.map(r => r.title).join(", ")}`);

    const reference = selectReference(eligible, config.reference);

    console.log(`Reference song: ${reference.title}`);
    console.log(`Reference views per day: ${Math.round(reference.viewsPerDay).toLocaleString("en-US")}`);
    console.log(`Reference total votes: ${Math.round(reference.voteTotal).toLocaleString("en-US")}`);

    return {
        reference,
        records: normalize(eligible, reference),
    };
}
