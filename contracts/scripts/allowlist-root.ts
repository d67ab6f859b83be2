import { Command } from "commander";
import {
    buildAllowlistProofs,
    parseBoolean,
    parseTier,
    readAddressRows,
    toAddresses,
    writeProofsFile,
} from "./utils.ts";
import { formatValidationErrors, validateAllowlist } from "./validation.ts";
import type { AllowlistTier } from "./types.ts";

interface Config {
    addressesCsv: string;
    tier: AllowlistTier;
    otherTierCsv: string | undefined;
    output: string | undefined;
    dryRun: boolean;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("allowlist-root")
        .description("Build the merkle root and per-address proofs for an OG or WL allowlist CSV")
        .requiredOption("--addresses-csv <path>", "Path to a CSV file with one address per line")
        .requiredOption("--tier <tier>", "Allowlist tier: og or wl", parseTier)
        .option("--other-tier-csv <path>", "CSV of the other tier, to reject addresses listed in both")
        .option("--output <path>", "Where to write the proofs JSON")
        .option("--dry-run <boolean>", "Validate and print the root without writing files (default: false)", parseBoolean, false)
        .parse();

    const opts = program.opts<{
        addressesCsv: string;
        tier: AllowlistTier;
        otherTierCsv?: string;
        output?: string;
        dryRun: boolean;
    }>();

    return {
        addressesCsv: opts.addressesCsv,
        tier: opts.tier,
        otherTierCsv: opts.otherTierCsv,
        output: opts.output,
        dryRun: opts.dryRun,
    };
}

async function run() {
    const config = parseCliArgs();

    const rows = readAddressRows(config.addressesCsv);
    console.log(`\nRead ${rows.length} addresses from CSV`);

    const otherRows = config.otherTierCsv ? readAddressRows(config.otherTierCsv) : undefined;
    if (otherRows) {
        console.log(`Read ${otherRows.length} addresses from the other tier CSV`);
    }

    const validationResult = validateAllowlist(rows, otherRows);
    if (!validationResult.valid) {
        throw new Error(
            `Validation failed with ${validationResult.errors.length} error(s):\n${formatValidationErrors(validationResult)}`,
        );
    }

    const proofs = buildAllowlistProofs(config.tier, toAddresses(rows));

    console.log("\n=== SUMMARY ===");
    console.log(`Tier: ${config.tier.toUpperCase()}`);
    console.log(`Addresses: ${proofs.count}`);
    console.log(`Merkle root: ${proofs.root}`);
    console.log();

    if (config.dryRun || !config.output) {
        console.log("No output path given or dry run enabled. Proofs were not written.");
        return;
    }

    writeProofsFile(config.output, proofs);
    console.log(`Proofs written to ${config.output}\n`);
}

run().catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
