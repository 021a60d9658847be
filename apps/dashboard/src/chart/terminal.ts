import chalk from "chalk";
import Table from "cli-table3";
import type { ComparisonFigure } from "./figure";

const BAR_WIDTH = 20;

function bar(percent: number, scale: number): string {
    const cells = Math.round((Math.max(0, percent) / scale) * BAR_WIDTH);
    return "█".repeat(Math.min(cells, BAR_WIDTH));
}

/** The comparison as a terminal table, one row per song in chart order. */
export function renderComparisonTable(figure: ComparisonFigure): string {
    const [views, votes] = figure.series;
    const annotated = new Map(figure.annotations.map(a => [a.key, a]));
    const scale = Math.max(100, ...figure.data.flatMap(d => [d.normalizedViews, d.normalizedVotes]));

    const table = new Table({
        head: [
            chalk.cyan.bold("#"),
            chalk.cyan.bold("Song"),
            chalk.hex(views.color).bold("Views"),
            chalk.hex(votes.color).bold("Votes"),
            chalk.cyan.bold("Δ"),
        ],
        style: {
            head: [],
            border: ["gray"],
        },
    });

    figure.data.forEach((datum, i) => {
        const annotation = annotated.get(datum.key);

        table.push([
            String(i + 1),
            datum.title.slice(0, 30),
            `${chalk.hex(views.color)(bar(datum.normalizedViews, scale))} ${datum.viewsText}`,
            `${chalk.hex(votes.color)(bar(datum.normalizedVotes, scale))} ${datum.votesText}`,
            annotation ? chalk.hex(annotation.color).bold(annotation.text) : chalk.gray("—"),
        ]);
    });

    return table.toString();
}
