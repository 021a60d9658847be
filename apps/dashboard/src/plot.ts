#!/usr/bin/env npx tsx

import { parseArgs } from "util";
import { deriveComparison } from "@votes-vs-views/shared";
import { loadEnv } from "./lib/env";
import { loadConfig } from "./lib/config";
import { createRecordStore } from "./lib/store";
import { createStatLookup } from "./lib/lookup";
import { refreshStatistics } from "./lib/refresh";
import { renderChart } from "./chart";

// Usage: plot [--out chart.svg] [--refresh]
async function main() {
    loadEnv();

    const { values } = parseArgs({
        options: {
            out: { type: "string", short: "o" },
            refresh: { type: "boolean", default: false },
        },
    });

    const config = loadConfig();
    const store = createRecordStore(config.store);

    if (values.refresh) {
        const summary = await refreshStatistics(await store.load(), { lookup: createStatLookup(config), store });
        console.log(`Refreshed ${summary.updated.length}/${summary.total} videos (${summary.skipped.length} skipped)`);
    }

    const { records } = deriveComparison(await store.load(), config.pipeline);
    const outputPath = values.out ?? config.chart.outputPath;

    const { outputPath: written } = await renderChart(
        records,
        config.chart.title,
        config.chart.annotateThreshold,
        { outputPath },
    );

    if (!written) {
        console.log("No output path given (--out or CHART_OUTPUT); nothing written.");
    }
}

main().catch((error: unknown) => {
    console.error("Error creating plot:", error instanceof Error ? error.message : error);
    process.exit(1);
});
