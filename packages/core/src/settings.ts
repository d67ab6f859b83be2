import { getAddress, isAddress, parseEther } from "viem";
import { z } from "zod";
import { CollectionError, CollectionErrorCode } from "./errors";
import { MAX_UINT64 } from "./math";
import { isMerkleRoot, ZERO_HASH } from "./merkle";
import { DEFAULT_PRESALE_INTERVAL } from "./stage";
import type { Address, CollectionSettings } from "./types";

export const DEFAULT_MAX_SUPPLY = 5000n;
export const DEFAULT_RESERVED_TOKENS = 50n;
export const DEFAULT_WITHDRAWAL_QUORUM = 3;

const uintSchema = z
    .union([
        z.number().int("Must be an integer").nonnegative("Must not be negative"),
        z.string().trim().regex(/^[0-9]+$/, "Must be a non-negative integer string"),
    ])
    .transform((value) => BigInt(value));

const timestampSchema = uintSchema.refine((value) => value <= MAX_UINT64, "Timestamp must fit in 64 bits");

const etherSchema = z
    .union([
        z.number().nonnegative("Price must not be negative"),
        z.string().trim().regex(/^\d+(\.\d+)?$/, "Price must be a decimal ether amount"),
    ])
    .transform((value, ctx) => {
        // String(1e-7) is "1e-7", which parseEther cannot read
        const text = String(value);
        if (!/^\d+(\.\d+)?$/.test(text)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "Price must be a decimal ether amount without an exponent; pass it as a string",
            });
            return z.NEVER;
        }
        return parseEther(text);
    });

const addressSchema = z
    .string()
    .trim()
    .refine((value) => isAddress(value, { strict: false }), "Invalid address")
    .transform((value): Address => getAddress(value));

const rootSchema = z.string().trim().refine(isMerkleRoot, "Merkle root must be a 32-byte hex string");

const tierSchema = z.object({
    price: etherSchema,
    maxTokenPerWallet: uintSchema,
    maxMintPerTx: uintSchema.optional(),
});

export const collectionSettingsSchema = z
    .object({
        name: z.string().trim().min(1, "Collection name is required"),
        symbol: z.string().trim().min(1, "Collection symbol is required"),
        maxSupply: uintSchema.default(Number(DEFAULT_MAX_SUPPLY)),
        reservedTokens: uintSchema.default(Number(DEFAULT_RESERVED_TOKENS)),
        presale: z.object({
            date: timestampSchema,
            interval: timestampSchema.default(Number(DEFAULT_PRESALE_INTERVAL)),
            og: tierSchema,
            wl: tierSchema,
        }),
        publicSale: z.object({
            price: etherSchema,
            date: timestampSchema,
            maxTokenPerWallet: uintSchema,
            maxMintPerTx: uintSchema.optional(),
        }),
        revealDate: timestampSchema.default(0),
        metadataBaseURI: z.string().default(""),
        ogMerkleRoot: rootSchema.default(ZERO_HASH),
        wlMerkleRoot: rootSchema.default(ZERO_HASH),
        admin: addressSchema,
        operators: z.array(addressSchema).default([]),
        withdrawal: z
            .object({
                quorum: z.number().int().min(1, "Quorum must be at least 1").default(DEFAULT_WITHDRAWAL_QUORUM),
                requirePublicSale: z.boolean().default(true),
            })
            .default({}),
        allowlistCap: z.enum(["per-wallet", "claim-once"]).default("per-wallet"),
    })
    .superRefine((value, ctx) => {
        if (value.reservedTokens > value.maxSupply) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "Reserved tokens cannot exceed the max supply",
                path: ["reservedTokens"],
            });
        }
    });

export type CollectionSettingsInput = z.input<typeof collectionSettingsSchema>;

function formatIssues(issues: readonly z.ZodIssue[]): string[] {
    return issues.map((issue) => {
        const path = issue.path.length ? ` at ${issue.path.join(".")}` : "";
        return `${issue.message}${path}`;
    });
}

/**
 * Validates raw (JSON-shaped) settings. Prices are ether amounts, dates are
 * unix seconds. Throws an InvalidArgument CollectionError listing every issue.
 */
export function parseCollectionSettings(input: unknown): CollectionSettings {
    const result = collectionSettingsSchema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error.issues);
        throw new CollectionError(
            CollectionErrorCode.INVALID_ARGUMENT,
            `Invalid collection settings: ${issues.join("; ")}`,
            { issues },
        );
    }

    const s = result.data;
    return {
        name: s.name,
        symbol: s.symbol,
        maxSupply: s.maxSupply,
        reservedTokens: s.reservedTokens,
        presaleInterval: s.presale.interval,
        presaleDate: s.presale.date,
        revealDate: s.revealDate,
        og: {
            price: s.presale.og.price,
            maxTokenPerWallet: s.presale.og.maxTokenPerWallet,
            maxMintPerTx: s.presale.og.maxMintPerTx ?? s.presale.og.maxTokenPerWallet,
        },
        wl: {
            price: s.presale.wl.price,
            maxTokenPerWallet: s.presale.wl.maxTokenPerWallet,
            maxMintPerTx: s.presale.wl.maxMintPerTx ?? s.presale.wl.maxTokenPerWallet,
        },
        publicSale: {
            price: s.publicSale.price,
            date: s.publicSale.date,
            maxTokenPerWallet: s.publicSale.maxTokenPerWallet,
            maxMintPerTx: s.publicSale.maxMintPerTx,
        },
        metadataBaseURI: s.metadataBaseURI,
        ogMerkleRoot: s.ogMerkleRoot,
        wlMerkleRoot: s.wlMerkleRoot,
        admin: s.admin,
        operators: s.operators,
        withdrawal: {
            quorum: s.withdrawal.quorum,
            requirePublicSale: s.withdrawal.requirePublicSale,
        },
        allowlistCap: s.allowlistCap,
    };
}
