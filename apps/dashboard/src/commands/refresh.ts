import ora from "ora";
import chalk from "chalk";
import cliProgress from "cli-progress";
import boxen from "boxen";
import type { SongRecord } from "@votes-vs-views/shared";
import type { RecordStore } from "../lib/store";
import type { StatLookup } from "../lib/youtube";
import { refreshStatistics, type RefreshSummary } from "../lib/refresh";
import { displayError } from "../ui";

export interface RefreshCommandOptions {
    store: RecordStore;
    createLookup: () => StatLookup;
    today?: string;
}

/**
 * Menu action: refresh every linked video with a spinner while the lookup
 * is set up, a progress bar during the loop, and a summary box at the end.
 * Returns null when the lookup could not be created.
 */
export async function runRefresh(records: readonly SongRecord[], options: RefreshCommandOptions): Promise<RefreshSummary | null> {
    const linked = records.filter(record => record.identifier !== null).length;
    const spinner = ora(chalk.yellow("🔄 Preparing YouTube refresh...")).start();

    let lookup: StatLookup;
    try {
        lookup = options.createLookup();
    } catch (error) {
        spinner.fail(chalk.red("Could not start the refresh"));
        displayError(error);
        return null;
    }
    spinner.succeed(chalk.green(`Fetching latest YouTube data for ${linked} linked videos`));

    const progress = new cliProgress.SingleBar({
        format: `   ${chalk.cyan("{bar}")} {percentage}% | {value}/{total} | {identifier}`,
        hideCursor: true,
    }, cliProgress.Presets.shades_classic);
    progress.start(linked, 0, { identifier: "" });

    const summary = await refreshStatistics(records, {
        lookup,
        store: options.store,
        today: options.today,
        onProgress: (done, _total, identifier) => progress.update(done, { identifier }),
    });
    progress.stop();

    const lines = [
        chalk.bold("YouTube statistics refreshed"),
        "",
        `   Updated: ${chalk.green.bold(summary.updated.length)}`,
        `   Skipped: ${summary.skipped.length > 0 ? chalk.yellow.bold(summary.skipped.length) : chalk.gray(0)}`,
        ...summary.skipped.map(s => chalk.gray(`     ${s.identifier}: ${s.reason}`)),
    ];

    console.log(boxen(lines.join("\n"), {
        padding: 1,
        margin: { top: 1, bottom: 1, left: 2, right: 2 },
        borderStyle: "round",
        borderColor: summary.skipped.length > 0 ? "yellow" : "green",
    }));

    return summary;
}
