import { resolve } from "path";
import { z } from "zod";
import { ViewsPerDayModeSchema, type PipelineConfig } from "@votes-vs-views/shared";
import { DEFAULT_CHART_OPTIONS } from "../chart/figure";

export const DEFAULT_CHART_TITLE = DEFAULT_CHART_OPTIONS.title;

const EnvSchema = z.object({
    YOUTUBE_API_KEY: z.string().optional(),
    RECORD_STORE: z.enum(["csv", "postgres"]).default("csv"),
    DATA_PATH: z.string().default("data/songs.csv"),
    STATS_PATH: z.string().default("data/stats.csv"),
    DATABASE_URL: z.string().url().optional(),

    COHORT_YEAR: z.coerce.number().int().default(2024),
    REFERENCE_POLICY: z.enum(["max_views", "by_title"]).default("max_views"),
    REFERENCE_TITLE: z.string().trim().min(1).optional(),
    VIEWS_PER_DAY: ViewsPerDayModeSchema.default("derived"),

    ANNOTATE_THRESHOLD: z.coerce.number().nonnegative().default(0),
    CHART_TITLE: z.string().default(DEFAULT_CHART_TITLE),
    CHART_OUTPUT: z.string().optional(),

    LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    LOOKUP_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(3600000),
});

export type StoreConfig =
    | { kind: "csv"; dataPath: string; statsPath: string }
    | { kind: "postgres"; databaseUrl: string };

export interface AppConfig {
    youtubeApiKey: string | null;
    store: StoreConfig;
    pipeline: PipelineConfig;
    chart: {
        title: string;
        annotateThreshold: number;
        outputPath: string | null;
    };
    lookup: {
        timeoutMs: number;
        cacheTtlMs: number;
    };
}

function buildConfigSchema(cwd: string) {
    return EnvSchema.transform((env, ctx): AppConfig => {
        let store: StoreConfig;
        if (env.RECORD_STORE === "postgres") {
            if (!env.DATABASE_URL) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["DATABASE_URL"], message: "required when RECORD_STORE=postgres" });
                return z.NEVER;
            }
            store = { kind: "postgres", databaseUrl: env.DATABASE_URL };
        } else {
            store = { kind: "csv", dataPath: resolve(cwd, env.DATA_PATH), statsPath: resolve(cwd, env.STATS_PATH) };
        }

        let reference: PipelineConfig["reference"];
        if (env.REFERENCE_POLICY === "by_title") {
            if (!env.REFERENCE_TITLE) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["REFERENCE_TITLE"], message: "required when REFERENCE_POLICY=by_title" });
                return z.NEVER;
            }
            reference = { kind: "by_title", title: env.REFERENCE_TITLE };
        } else {
            reference = { kind: "max_views" };
        }

        return {
            youtubeApiKey: env.YOUTUBE_API_KEY ?? null,
            store,
            pipeline: {
                cohortYear: env.COHORT_YEAR,
                reference,
                viewsPerDay: env.VIEWS_PER_DAY,
            },
            chart: {
                title: env.CHART_TITLE,
                annotateThreshold: env.ANNOTATE_THRESHOLD,
                outputPath: env.CHART_OUTPUT ? resolve(cwd, env.CHART_OUTPUT) : null,
            },
            lookup: {
                timeoutMs: env.LOOKUP_TIMEOUT_MS,
                cacheTtlMs: env.LOOKUP_CACHE_TTL_MS,
            },
        };
    });
}

/**
 * Build the app configuration from environment variables.
 * Blank variables count as unset so `KEY=` lines in .env fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
    );

    const result = buildConfigSchema(cwd).safeParse(present);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid configuration: ${details}`);
    }
    return result.data;
}
