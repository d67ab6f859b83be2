import { readFileSync, writeFileSync } from "fs";
import {
    buildAllowlistTree,
    describeSchedule,
    getSaleStage,
    parseCollectionSettings,
    stageName,
    type CollectionSettings,
} from "@stagemint/core";
import { formatEther, getAddress, isAddress, isHex, size, type Hex } from "viem";
import { z } from "zod";
import type { AddressRow, AllowlistProofs, AllowlistTier } from "./types.ts";

export function parseBoolean(value: string): boolean {
    if (value === "true") return true;
    if (value === "false") return false;
    throw new Error(`Invalid boolean "${value}". Expected "true" or "false".`);
}

export function parseAddress(value: string): `0x${string}` {
    if (!/^0x[a-fA-F0-9]{40}$/.test(value)) {
        throw new Error(`Invalid address "${value}". Expected format: 0x followed by 40 hexadecimal characters.`);
    }
    return getAddress(value);
}

export function parseRoot(value: string): `0x${string}` {
    if (!isHex(value) || size(value) !== 32) {
        throw new Error(`Invalid merkle root "${value}". Expected 0x followed by 64 hexadecimal characters.`);
    }
    return value;
}

export function parseTier(value: string): AllowlistTier {
    if (value === "og" || value === "wl") return value;
    throw new Error(`Invalid tier "${value}". Expected "og" or "wl".`);
}

export function parseTimestamp(value: string): bigint {
    if (!/^[0-9]+$/.test(value)) {
        throw new Error(`Invalid timestamp "${value}". Expected unix seconds.`);
    }
    return BigInt(value);
}

export function formatTimestamp(timestamp: bigint): string {
    const ms = timestamp * 1000n;
    if (ms > 8_640_000_000_000_000n) {
        return `${timestamp} (out of date range)`;
    }
    return `${timestamp} (${new Date(Number(ms)).toISOString()})`;
}

// expects one address per line, optionally followed by other comma-separated
// columns which are ignored:
// ADDRESS
// 0x...
export function parseAddressRows(content: string): AddressRow[] {
    const lines = content.split(/\r?\n/);
    const rows: AddressRow[] = [];
    lines.forEach((raw, i) => {
        const value = raw.split(",")[0].trim();
        if (value.length === 0) return;
        // header row
        if (i === 0 && !value.startsWith("0x")) return;
        rows.push({ line: i + 1, value });
    });
    return rows;
}

export function readAddressRows(csvPath: string): AddressRow[] {
    return parseAddressRows(readFileSync(csvPath, "utf-8"));
}

/** Normalizes validated rows to checksummed addresses, in file order. */
export function toAddresses(rows: AddressRow[]): `0x${string}`[] {
    return rows.filter((r) => isAddress(r.value, { strict: false })).map((r) => getAddress(r.value));
}

export function buildAllowlistProofs(tier: AllowlistTier, addresses: `0x${string}`[]): AllowlistProofs {
    const tree = buildAllowlistTree(addresses);
    const proofs: Record<`0x${string}`, `0x${string}`[]> = {};
    for (const address of addresses) {
        proofs[address] = tree.getProof(address) ?? [];
    }
    return { tier, root: tree.root, count: addresses.length, proofs };
}

export function writeProofsFile(path: string, proofs: AllowlistProofs): void {
    writeFileSync(path, JSON.stringify(proofs, null, 2) + "\n", "utf-8");
}

const hexSchema = z.string().refine((value): value is Hex => isHex(value), "Proof elements must be hex strings");

const proofsFileSchema = z.object({
    tier: z.enum(["og", "wl"]),
    root: z
        .string()
        .refine((value): value is Hex => isHex(value) && size(value) === 32, "Root must be a 32-byte hex string"),
    count: z.number().int().nonnegative().optional(),
    proofs: z.record(
        z.string().refine((value): boolean => isAddress(value, { strict: false }), "Invalid address"),
        z.array(hexSchema),
    ),
});

export function readProofsFile(path: string): AllowlistProofs {
    const result = proofsFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (!result.success) {
        const issues = result.error.issues.map((issue) =>
            issue.path.length ? `${issue.message} at ${issue.path.join(".")}` : issue.message,
        );
        throw new Error(`Proofs file ${path} is invalid: ${issues.join("; ")}`);
    }

    const { tier, root, count, proofs } = result.data;
    const entries: Record<`0x${string}`, `0x${string}`[]> = {};
    for (const [address, proof] of Object.entries(proofs)) {
        entries[getAddress(address)] = proof;
    }
    return { tier, root, count: count ?? Object.keys(entries).length, proofs: entries };
}

export function loadCollectionSettings(path: string): CollectionSettings {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return parseCollectionSettings(parsed);
}

export function summarizeSettings(settings: CollectionSettings, at: bigint): string[] {
    const schedule = {
        presaleDate: settings.presaleDate,
        publicSaleDate: settings.publicSale.date,
        presaleInterval: settings.presaleInterval,
    };
    const lines: string[] = [];
    lines.push(`Collection: ${settings.name} (${settings.symbol})`);
    lines.push(`Max supply: ${settings.maxSupply} (reserved: ${settings.reservedTokens})`);
    lines.push(`Stages:`);
    for (const window of describeSchedule(schedule)) {
        lines.push(`  ${stageName(window.stage)} from ${formatTimestamp(window.startsAt)}`);
    }
    lines.push(`Prices:`);
    lines.push(`  OG: ${formatEther(settings.og.price)} (max ${settings.og.maxTokenPerWallet} per wallet)`);
    lines.push(`  WL: ${formatEther(settings.wl.price)} (max ${settings.wl.maxTokenPerWallet} per wallet)`);
    lines.push(
        `  Public: ${formatEther(settings.publicSale.price)} (max ${settings.publicSale.maxTokenPerWallet} per wallet)`,
    );
    lines.push(`Allowlist cap mode: ${settings.allowlistCap}`);
    lines.push(`Withdrawal quorum: ${settings.withdrawal.quorum}`);
    lines.push(`Stage at ${formatTimestamp(at)}: ${stageName(getSaleStage(at, schedule))}`);
    return lines;
}
