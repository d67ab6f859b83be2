import { parseEther } from "viem";
import { expect } from "vitest";
import { createManualClock } from "../src/clock";
import { Collection, type CollectionOptions } from "../src/collection";
import { isCollectionError, type CollectionErrorCode } from "../src/errors";
import { Ledger } from "../src/funds";
import { buildAllowlistTree } from "../src/merkle";
import type { Address, CollectionSettings } from "../src/types";

export const ADMIN = "0x00000000000000000000000000000000000000aa" as const;
export const OPERATOR_1 = "0x00000000000000000000000000000000000000b1" as const;
export const OPERATOR_2 = "0x00000000000000000000000000000000000000b2" as const;
export const MINTER_1 = "0x00000000000000000000000000000000000000c1" as const;
export const MINTER_2 = "0x00000000000000000000000000000000000000c2" as const;
export const MINTER_3 = "0x00000000000000000000000000000000000000c3" as const;
export const OUTSIDER = "0x00000000000000000000000000000000000000dd" as const;

export const OG_MEMBERS: Address[] = [
    "0x00000000000000000000000000000000000000e1",
    "0x00000000000000000000000000000000000000e2",
    "0x00000000000000000000000000000000000000e3",
];

export const WL_MEMBERS: Address[] = [
    "0x00000000000000000000000000000000000000f1",
    "0x00000000000000000000000000000000000000f2",
    "0x00000000000000000000000000000000000000f3",
    "0x00000000000000000000000000000000000000f4",
];

export const ogTree = buildAllowlistTree(OG_MEMBERS);
export const wlTree = buildAllowlistTree(WL_MEMBERS);

export const PRESALE_DATE = 1_700_000_000n;
export const PUBLIC_SALE_DATE = PRESALE_DATE + 1200n;

export const OG_PRICE = parseEther("0.025");
export const WL_PRICE = parseEther("0.025");
export const PUBLIC_PRICE = parseEther("0.03");

export function makeSettings(overrides: Partial<CollectionSettings> = {}): CollectionSettings {
    return {
        name: "Test Collection",
        symbol: "TEST",
        maxSupply: 5000n,
        reservedTokens: 50n,
        presaleInterval: 900n,
        presaleDate: PRESALE_DATE,
        revealDate: PUBLIC_SALE_DATE + 300n,
        og: { price: OG_PRICE, maxTokenPerWallet: 3n, maxMintPerTx: 3n },
        wl: { price: WL_PRICE, maxTokenPerWallet: 2n, maxMintPerTx: 2n },
        publicSale: { price: PUBLIC_PRICE, date: PUBLIC_SALE_DATE, maxTokenPerWallet: 5n },
        metadataBaseURI: "",
        ogMerkleRoot: ogTree.root,
        wlMerkleRoot: wlTree.root,
        admin: ADMIN,
        operators: [OPERATOR_1, OPERATOR_2],
        withdrawal: { quorum: 3, requirePublicSale: true },
        allowlistCap: "per-wallet",
        ...overrides,
    };
}

export function setup(overrides: Partial<CollectionSettings> = {}, opts: CollectionOptions = {}) {
    const clock = createManualClock(PRESALE_DATE - 100n);
    const ledger = new Ledger();
    const collection = new Collection(makeSettings(overrides), { clock, transport: ledger, ...opts });
    return { clock, ledger, collection };
}

export function ogProof(address: Address) {
    return ogTree.getProof(address) ?? [];
}

export function wlProof(address: Address) {
    return wlTree.getProof(address) ?? [];
}

/** Runs `fn` and returns the thrown value, failing if nothing was thrown. */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error("Expected the call to throw");
}

export function expectCode(fn: () => unknown, code: CollectionErrorCode): void {
    const err = catchError(fn);
    if (!isCollectionError(err)) {
        throw new Error(`Expected a CollectionError, got ${String(err)}`);
    }
    expect(err.code).toBe(code);
}
