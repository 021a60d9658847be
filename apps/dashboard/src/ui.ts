import chalk from "chalk";
import boxen from "boxen";
import { isPipelineError } from "@votes-vs-views/shared";

export function displayError(error: unknown) {
    const heading = isPipelineError(error) ? `${error.name} (${error.code})` : "Unexpected error";
    const message = error instanceof Error ? error.message : String(error);

    console.log(boxen(`${chalk.red.bold(heading)}\n\n${chalk.white(message)}`, {
        padding: 1,
        margin: { top: 0, bottom: 1, left: 2, right: 2 },
        borderStyle: "double",
        borderColor: "red",
        title: "Error",
        titleAlignment: "center",
    }));
}
