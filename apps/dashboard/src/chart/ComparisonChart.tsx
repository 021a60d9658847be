import {
    Bar,
    BarChart,
    CartesianGrid,
    Customized,
    LabelList,
    Rectangle,
    ReferenceDot,
    XAxis,
    YAxis,
} from "recharts";
import { z } from "zod";
import type { ComparisonFigure, FigureSeries } from "./figure";

interface ComparisonChartProps {
    figure: ComparisonFigure;
}

const MARGIN = { top: 80, right: 32, bottom: 40, left: 64 };

function ChartHeader({ figure }: { figure: ComparisonFigure }) {
    const legendX = figure.width - MARGIN.right - 260;

    return (
        <g className="comparison-header">
            <text x={figure.width / 2} y={28} textAnchor="middle" fontSize={18} fontWeight="bold">
                {figure.title}
            </text>
            {figure.series.map((series, i) => (
                <g key={series.key} transform={`translate(${legendX}, ${44 + i * 18})`}>
                    <rect width={12} height={12} fill={series.color} fillOpacity={0.8} />
                    <text x={18} y={10} fontSize={12}>{series.name}</text>
                </g>
            ))}
        </g>
    );
}

const BarShapeSchema = z.object({
    x: z.number(),
    y: z.number(),
    width: z.number(),
    height: z.number(),
    fill: z.string().optional(),
    fillOpacity: z.number().optional(),
    payload: z.record(z.unknown()),
});

// Bar with a native <title> tooltip carrying the raw value
function hoverBar(hoverKey: FigureSeries["hoverKey"]) {
    return (props: unknown) => {
        const parsed = BarShapeSchema.safeParse(props);
        if (!parsed.success) return <g />;

        const { payload, ...rect } = parsed.data;
        const hover = payload[hoverKey];

        return (
            <g className="comparison-bar">
                {typeof hover === "string" && <title>{hover}</title>}
                <Rectangle {...rect} />
            </g>
        );
    };
}

/**
 * Grouped bars of normalized views and votes per song, with a difference
 * marker above each annotated pair.
 */
export function ComparisonChart({ figure }: ComparisonChartProps) {
    const [views, votes] = figure.series;
    const titles = new Map(figure.data.map(datum => [datum.key, datum.title]));

    return (
        <BarChart
            width={figure.width}
            height={figure.height}
            data={figure.data}
            margin={MARGIN}
            barCategoryGap="15%"
            barGap={4}
            style={{ background: figure.background }}
        >
            <CartesianGrid vertical={false} stroke="#dddddd" />
            <XAxis
                dataKey="key"
                tickFormatter={(key: string) => titles.get(key) ?? key}
                interval={0}
                angle={-45}
                textAnchor="end"
                height={110}
                label={{ value: figure.xAxisTitle, position: "insideBottom", offset: 0 }}
            />
            <YAxis
                tickFormatter={(value: number) => `${value}%`}
                label={{ value: figure.yAxisTitle, angle: -90, position: "insideLeft" }}
            />
            <Bar
                dataKey={views.key}
                name={views.name}
                fill={views.color}
                fillOpacity={0.8}
                isAnimationActive={false}
                shape={hoverBar(views.hoverKey)}
            >
                <LabelList dataKey={views.labelKey} position="top" fontSize={11} />
            </Bar>
            <Bar
                dataKey={votes.key}
                name={votes.name}
                fill={votes.color}
                fillOpacity={0.8}
                isAnimationActive={false}
                shape={hoverBar(votes.hoverKey)}
            >
                <LabelList dataKey={votes.labelKey} position="top" fontSize={11} />
            </Bar>
            {figure.annotations.map(annotation => (
                <ReferenceDot
                    key={annotation.key}
                    x={annotation.key}
                    y={annotation.y}
                    r={3}
                    fill={annotation.color}
                    stroke={annotation.color}
                    ifOverflow="extendDomain"
                    label={{
                        value: annotation.text,
                        position: "top",
                        offset: 14,
                        fill: annotation.color,
                        fontSize: 12,
                        fontWeight: "bold",
                    }}
                />
            ))}
            <Customized component={<ChartHeader figure={figure} />} />
        </BarChart>
    );
}
