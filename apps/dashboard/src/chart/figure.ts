import { formatPercent, formatSigned, type DerivedRecord } from "@votes-vs-views/shared";

// ============================================================
// Options
// ============================================================

export interface ChartPalette {
    views: string;
    votes: string;
    positiveStrong: string;
    positive: string;
    negativeStrong: string;
    negative: string;
    background: string;
}

export interface ChartOptions {
    title: string;
    xAxisTitle: string;
    yAxisTitle: string;
    viewsLabel: string;
    votesLabel: string;
    /** Annotate when |difference| exceeds this; 0 or less annotates every song. */
    annotateThreshold: number;
    /** Differences beyond this many points get the bright shade. */
    magnitudeThreshold: number;
    palette: ChartPalette;
    width: number;
    height: number;
}

export type ChartOptionsInput = Partial<Omit<ChartOptions, "palette">> & {
    palette?: Partial<ChartPalette>;
};

export const DEFAULT_PALETTE: ChartPalette = {
    views: "#1f77b4",
    votes: "#d62728",
    positiveStrong: "#2ecc71",
    positive: "#27ae60",
    negativeStrong: "#e74c3c",
    negative: "#c0392b",
    background: "#f7f7f7",
};

export const DEFAULT_CHART_OPTIONS: ChartOptions = {
    title: "Listener Votes vs. YouTube MV Views",
    xAxisTitle: "Song",
    yAxisTitle: "Normalized Value",
    viewsLabel: "MV Views per Day (Normalized)",
    votesLabel: "Total Votes (Normalized)",
    annotateThreshold: 0,
    magnitudeThreshold: 10,
    palette: DEFAULT_PALETTE,
    width: 1000,
    height: 600,
};

export function resolveChartOptions(input: ChartOptionsInput = {}): ChartOptions {
    return {
        ...DEFAULT_CHART_OPTIONS,
        ...input,
        palette: { ...DEFAULT_PALETTE, ...input.palette },
    };
}

// ============================================================
// Figure model
// ============================================================

export interface FigureDatum {
    /** Category key, unique per record; titles may repeat */
    key: string;
    title: string;
    normalizedViews: number;
    normalizedVotes: number;
    proportionDifference: number;
    /** Bar labels, rounded for display */
    viewsText: string;
    votesText: string;
    /** Raw values for hover */
    viewsPerDay: number;
    voteTotal: number;
    /** Hover text per bar, shown as the SVG <title> tooltip */
    viewsHover: string;
    votesHover: string;
}

export interface FigureSeries {
    key: "normalizedViews" | "normalizedVotes";
    labelKey: "viewsText" | "votesText";
    hoverKey: "viewsHover" | "votesHover";
    name: string;
    color: string;
}

export interface FigureAnnotation {
    /** Key of the annotated datum */
    key: string;
    title: string;
    /** Anchor height, just above the taller bar */
    y: number;
    text: string;
    color: string;
}

/** Everything needed to draw the comparison, in render order. */
export interface ComparisonFigure {
    title: string;
    xAxisTitle: string;
    yAxisTitle: string;
    width: number;
    height: number;
    background: string;
    series: [FigureSeries, FigureSeries];
    data: FigureDatum[];
    annotations: FigureAnnotation[];
}

function formatCount(value: number): string {
    return Math.round(value).toLocaleString("en-US");
}

export function shouldAnnotate(difference: number, threshold: number): boolean {
    return threshold <= 0 || Math.abs(difference) > threshold;
}

export function differenceColor(difference: number, palette: ChartPalette, magnitudeThreshold: number): string {
    const strong = Math.abs(difference) > magnitudeThreshold;
    if (difference > 0) {
        return strong ? palette.positiveStrong : palette.positive;
    }
    return strong ? palette.negativeStrong : palette.negative;
}

export function buildComparisonFigure(records: readonly DerivedRecord[], input: ChartOptionsInput = {}): ComparisonFigure {
    const options = resolveChartOptions(input);
    const { palette } = options;

    const data = records.map((record, index): FigureDatum => ({
        key: String(index),
        title: record.title,
        normalizedViews: record.normalizedViews,
        normalizedVotes: record.normalizedVotes,
        proportionDifference: record.proportionDifference,
        viewsText: formatPercent(record.normalizedViews),
        votesText: formatPercent(record.normalizedVotes),
        viewsPerDay: record.viewsPerDay,
        voteTotal: record.voteTotal,
        viewsHover: [
            record.title,
            `${options.viewsLabel}: ${formatPercent(record.normalizedViews)}`,
            `Views per day: ${formatCount(record.viewsPerDay)}`,
        ].join("\n"),
        votesHover: [
            record.title,
            `${options.votesLabel}: ${formatPercent(record.normalizedVotes)}`,
            `Total votes: ${formatCount(record.voteTotal)}`,
        ].join("\n"),
    }));

    const annotations = data
        .filter(datum => shouldAnnotate(datum.proportionDifference, options.annotateThreshold))
        .map((datum): FigureAnnotation => ({
            key: datum.key,
            title: datum.title,
            y: Math.max(datum.normalizedViews, datum.normalizedVotes) + 2,
            text: `Δ${formatSigned(datum.proportionDifference)}%`,
            color: differenceColor(datum.proportionDifference, palette, options.magnitudeThreshold),
        }));

    return {
        title: options.title,
        xAxisTitle: options.xAxisTitle,
        yAxisTitle: options.yAxisTitle,
        width: options.width,
        height: options.height,
        background: palette.background,
        series: [
            { key: "normalizedViews", labelKey: "viewsText", hoverKey: "viewsHover", name: options.viewsLabel, color: palette.views },
            { key: "normalizedVotes", labelKey: "votesText", hoverKey: "votesHover", name: options.votesLabel, color: palette.votes },
        ],
        data,
        annotations,
    };
}
