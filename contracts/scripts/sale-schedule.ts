import { Command } from "commander";
import { loadCollectionSettings, parseTimestamp, summarizeSettings } from "./utils.ts";

interface Config {
    configFile: string;
    at: bigint | undefined;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("sale-schedule")
        .description("Print the sale stages, prices and caps of a collection config")
        .requiredOption("--config-file <path>", "Collection config JSON")
        .option("--at <timestamp>", "Unix time to report the stage for (default: now)", parseTimestamp)
        .parse();

    const opts = program.opts<{ configFile: string; at?: bigint }>();

    return { configFile: opts.configFile, at: opts.at };
}

async function run() {
    const config = parseCliArgs();
    const settings = loadCollectionSettings(config.configFile);
    const at = config.at ?? BigInt(Math.floor(Date.now() / 1000));

    console.log();
    for (const line of summarizeSettings(settings, at)) {
        console.log(line);
    }
    if (settings.presaleDate > settings.publicSale.date) {
        console.warn(`⚠ Warning: presale date is after the public sale date; presale stages are skipped`);
    }
    if (settings.metadataBaseURI === "") {
        console.warn(`⚠ Warning: metadata base URI is empty; withdrawals stay blocked until it is set`);
    }
    console.log();
}

run().catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
