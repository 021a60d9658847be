export {
    buildComparisonFigure,
    resolveChartOptions,
    shouldAnnotate,
    differenceColor,
    DEFAULT_CHART_OPTIONS,
    DEFAULT_PALETTE,
} from "./figure";
export type {
    ChartOptions,
    ChartOptionsInput,
    ChartPalette,
    ComparisonFigure,
    FigureAnnotation,
    FigureDatum,
    FigureSeries,
} from "./figure";
export { ComparisonChart } from "./ComparisonChart";
export { renderChart, renderSvg, renderHtml, formatFromPath } from "./render";
export type { RenderOptions, RenderResult, OutputFormat } from "./render";
export { renderComparisonTable } from "./terminal";
