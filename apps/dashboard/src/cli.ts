#!/usr/bin/env npx tsx

import ora from "ora";
import chalk from "chalk";
import inquirer from "inquirer";
import Table from "cli-table3";
import gradient from "gradient-string";
import figlet from "figlet";
import boxen from "boxen";
import { deriveComparison, type SongRecord } from "@votes-vs-views/shared";
import { loadEnv } from "./lib/env";
import { loadConfig, type AppConfig } from "./lib/config";
import { createRecordStore, type RecordStore } from "./lib/store";
import { createStatLookup } from "./lib/lookup";
import { renderChart, renderComparisonTable } from "./chart";
import { runRefresh } from "./commands/refresh";
import { displayError } from "./ui";

// Custom gradient theme
const coolGradient = gradient(["#00d4ff", "#9333ea", "#ff0080"]);

// ============================================================
// Banner - ASCII Art with Gradient
// ============================================================

function printBanner() {
    console.clear();

    const title = figlet.textSync("VOTES VS VIEWS", {
        font: "Small",
        horizontalLayout: "default",
    });

    console.log("\n" + coolGradient(title));

    console.log(boxen(
        chalk.white("🎵 Listener votes compared with YouTube MV views per day\n") +
        chalk.gray("   Both metrics normalized to a reference song"),
        {
            padding: 1,
            margin: { top: 0, bottom: 1, left: 2, right: 2 },
            borderStyle: "round",
            borderColor: "cyan",
        }
    ));
}

// ============================================================
// Dashboard
// ============================================================

function displayRawData(records: SongRecord[]) {
    const table = new Table({
        head: ["Title", "Year", "Total", "view per day", "youtube_id", "Observed"].map(h => chalk.cyan.bold(h)),
        style: {
            head: [],
            border: ["gray"],
        },
    });

    for (const record of records) {
        table.push([
            record.title.slice(0, 30),
            record.year === null ? chalk.gray("—") : String(record.year),
            record.voteTotal === null ? chalk.gray("—") : record.voteTotal.toLocaleString("en-US"),
            record.viewsPerDay === null ? chalk.gray("—") : Math.round(record.viewsPerDay).toLocaleString("en-US"),
            record.identifier ?? chalk.gray("—"),
            record.observation
                ? `${record.observation.observedAt} (${record.observation.viewCount.toLocaleString("en-US")} views)`
                : chalk.gray("—"),
        ]);
    }

    console.log(chalk.bold("\n📋 Raw Data"));
    console.log(table.toString());
}

async function loadRecords(store: RecordStore): Promise<SongRecord[] | null> {
    const spinner = ora(chalk.cyan("Loading song table...")).start();
    try {
        const records = await store.load();
        spinner.succeed(chalk.green(`Loaded ${records.length} songs`));
        return records;
    } catch (error) {
        spinner.fail(chalk.red("Could not load the song table"));
        displayError(error);
        return null;
    }
}

async function displayComparison(records: SongRecord[], config: AppConfig) {
    try {
        const { reference, records: derived } = deriveComparison(records, config.pipeline);
        const { figure, outputPath } = await renderChart(
            derived,
            config.chart.title,
            config.chart.annotateThreshold,
            { outputPath: config.chart.outputPath },
        );

        console.log("\n" + chalk.bold(`📊 ${figure.title}`));
        console.log(renderComparisonTable(figure));
        console.log(chalk.gray(`   Reference: ${reference.title} = 100%`));
        if (outputPath) {
            console.log(chalk.gray(`   Chart written to ${outputPath}`));
        }
        console.log();
    } catch (error) {
        displayError(error);
    }
}

// ============================================================
// Main CLI
// ============================================================

async function main() {
    printBanner();
    loadEnv();

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        displayError(error);
        process.exitCode = 1;
        return;
    }

    const store = createRecordStore(config.store);
    let showRawData = false;

    while (true) {
        const records = await loadRecords(store);
        if (records) {
            await displayComparison(records, config);
            if (showRawData) displayRawData(records);
        }

        const { action } = await inquirer.prompt<{ action: "refresh" | "toggle" | "quit" }>([
            {
                type: "list",
                name: "action",
                message: chalk.cyan.bold("🎯 What next?"),
                choices: [
                    {
                        name: `  ${chalk.yellow.bold("🔄 Refresh statistics")}   ${chalk.gray("→ Fetch view counts for every linked MV")}`,
                        value: "refresh",
                    },
                    {
                        name: `  ${chalk.magenta.bold(showRawData ? "📋 Hide raw data" : "📋 Show raw data")}`,
                        value: "toggle",
                    },
                    {
                        name: `  ${chalk.gray("👋 Quit")}`,
                        value: "quit",
                    },
                ],
                loop: false,
            },
        ]);

        if (action === "quit") break;

        if (action === "toggle") {
            showRawData = !showRawData;
            continue;
        }

        if (!records) {
            console.log(chalk.yellow("Nothing to refresh: the song table did not load."));
            continue;
        }
        await runRefresh(records, { store, createLookup: () => createStatLookup(config) });
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
