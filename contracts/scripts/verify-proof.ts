import { Command } from "commander";
import { verifyAllowlistProof } from "@stagemint/core";
import { parseAddress, parseRoot, readProofsFile } from "./utils.ts";

interface Config {
    proofsFile: string;
    address: `0x${string}`;
    root: `0x${string}` | undefined;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("verify-proof")
        .description("Check an address's allowlist proof against a merkle root")
        .requiredOption("--proofs-file <path>", "Proofs JSON written by allowlist-root")
        .requiredOption("--address <address>", "Address to check", parseAddress)
        .option("--root <root>", "Root to check against (default: the root in the proofs file)", parseRoot)
        .parse();

    const opts = program.opts<{ proofsFile: string; address: `0x${string}`; root?: `0x${string}` }>();

    return { proofsFile: opts.proofsFile, address: opts.address, root: opts.root };
}

async function run() {
    const config = parseCliArgs();
    const file = readProofsFile(config.proofsFile);
    const root = config.root ?? file.root;

    const proof = file.proofs[config.address];
    if (!proof) {
        console.log(`${config.address} is not in the ${file.tier.toUpperCase()} proofs file`);
        process.exitCode = 1;
        return;
    }

    const valid = verifyAllowlistProof(config.address, proof, root);
    console.log(`Tier: ${file.tier.toUpperCase()}`);
    console.log(`Root: ${root}`);
    console.log(`Proof length: ${proof.length}`);
    console.log(valid ? `✓ ${config.address} is allowlisted` : `✗ Proof for ${config.address} does not match the root`);
    if (!valid) {
        process.exitCode = 1;
    }
}

run().catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
