import { writeFile, mkdir } from "fs/promises";
import { dirname, extname } from "path";
import { renderToStaticMarkup } from "react-dom/server";
import { RenderError, type DerivedRecord } from "@votes-vs-views/shared";
import { ComparisonChart } from "./ComparisonChart";
import { buildComparisonFigure, type ChartOptionsInput, type ComparisonFigure } from "./figure";

export type OutputFormat = "svg" | "html" | "json";

export interface RenderOptions {
    /** When set, the chart is written here; the extension picks the format. */
    outputPath?: string | null;
    chart?: ChartOptionsInput;
}

export interface RenderResult {
    figure: ComparisonFigure;
    outputPath: string | null;
    format: OutputFormat | null;
}

const SVG_NS = "http://www.w3.org/2000/svg";

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;");
}

export function formatFromPath(path: string): OutputFormat {
    switch (extname(path).toLowerCase()) {
        case ".svg":
            return "svg";
        case ".html":
        case ".htm":
            return "html";
        case ".json":
            return "json";
        default:
            throw new RenderError(`Unsupported chart output "${path}": use .svg, .html or .json`);
    }
}

// ============================================================
// Serializers
// ============================================================

export function renderSvg(figure: ComparisonFigure): string {
    let markup: string;
    try {
        markup = renderToStaticMarkup(<ComparisonChart figure={figure} />);
    } catch (error) {
        throw new RenderError("Chart rendering failed", { cause: error });
    }

    // recharts wraps its <svg> surface in a div
    const start = markup.indexOf("<svg");
    const end = markup.lastIndexOf("</svg>");
    if (start === -1 || end === -1) {
        throw new RenderError("Chart rendering produced no SVG surface");
    }

    const svg = markup.slice(start, end + "</svg>".length);
    return svg.includes("xmlns=") ? svg : svg.replace("<svg", `<svg xmlns="${SVG_NS}"`);
}

export function renderHtml(figure: ComparisonFigure): string {
    const data = JSON.stringify(figure).replace(/</g, "\\u003c");

    return [
        "<!DOCTYPE html>",
        "<html lang=\"en\">",
        "<head>",
        "<meta charset=\"utf-8\">",
        `<title>${escapeHtml(figure.title)}</title>`,
        "</head>",
        `<body style="background:${figure.background};font-family:sans-serif">`,
        `<figure>${renderSvg(figure)}</figure>`,
        `<script type="application/json" id="comparison-figure">${data}</script>`,
        "</body>",
        "</html>",
        "",
    ].join("\n");
}

// ============================================================
// Render entry
// ============================================================

/**
 * Build the comparison figure and, when an output path is given, write it as
 * a static SVG, a standalone HTML page or the figure's JSON.
 */
export async function renderChart(
    records: readonly DerivedRecord[],
    titleText: string,
    annotateThreshold: number,
    options: RenderOptions = {},
): Promise<RenderResult> {
    const outputPath = options.outputPath ?? null;
    const format = outputPath ? formatFromPath(outputPath) : null;

    const figure = buildComparisonFigure(records, {
        ...options.chart,
        title: titleText,
        annotateThreshold,
    });

    if (!outputPath || !format) {
        return { figure, outputPath: null, format: null };
    }

    const content = format === "svg"
        ? renderSvg(figure)
        : format === "html"
            ? renderHtml(figure)
            : `${JSON.stringify(figure, null, 2)}\n`;

    try {
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, content, "utf-8");
    } catch (error) {
        throw new RenderError(`Could not write chart to ${outputPath}`, { cause: error });
    }

    console.log(`Plot saved to ${outputPath}`);
    return { figure, outputPath, format };
}
