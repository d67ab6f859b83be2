import { concat, isHex, keccak256, size } from "viem";
import type { Address, Hex } from "./types";

export const ZERO_HASH: Hex = "0x0000000000000000000000000000000000000000000000000000000000000000";

function isHash(value: unknown): value is Hex {
    return typeof value === "string" && isHex(value, { strict: true }) && size(value) === 32;
}

export function isMerkleRoot(value: unknown): value is Hex {
    return isHash(value);
}

/** Leaf of an allowlist tree: keccak256 over the 20 address bytes. */
export function hashLeaf(address: Address): Hex {
    return keccak256(address);
}

// Hex strings of equal length compare like the bytes they encode once the
// case is normalized.
function compareHashes(a: Hex, b: Hex): number {
    const la = a.toLowerCase();
    const lb = b.toLowerCase();
    if (la === lb) return 0;
    return la < lb ? -1 : 1;
}

export function hashPair(a: Hex, b: Hex): Hex {
    return compareHashes(a, b) <= 0 ? keccak256(concat([a, b])) : keccak256(concat([b, a]));
}

export function processProof(leaf: Hex, proof: readonly Hex[]): Hex {
    let computed = leaf;
    for (const sibling of proof) {
        computed = hashPair(computed, sibling);
    }
    return computed;
}

/**
 * Checks a sorted-pair merkle proof. Returns false for an unset root or any
 * proof element that is not a 32-byte hash.
 */
export function verifyProof(proof: readonly unknown[], root: Hex, leaf: Hex): boolean {
    if (!isHash(root) || compareHashes(root, ZERO_HASH) === 0) {
        return false;
    }
    const siblings: Hex[] = [];
    for (const element of proof) {
        if (!isHash(element)) {
            return false;
        }
        siblings.push(element);
    }
    return compareHashes(processProof(leaf, siblings), root) === 0;
}

export function verifyAllowlistProof(address: Address, proof: readonly unknown[], root: Hex): boolean {
    return verifyProof(proof, root, hashLeaf(address));
}

export type AllowlistTree = {
    root: Hex;
    leaves: readonly Hex[];
    getProof(address: Address): Hex[] | undefined;
};

/**
 * Builds a sorted-pair tree over the given addresses, in input order. An odd
 * node at the end of a layer is carried up unchanged.
 */
export function buildAllowlistTree(addresses: readonly Address[]): AllowlistTree {
    if (addresses.length === 0) {
        throw new Error("Cannot build an allowlist tree without addresses");
    }

    const leaves = addresses.map(hashLeaf);
    const layers: Hex[][] = [leaves];
    while (layers[layers.length - 1].length > 1) {
        const current = layers[layers.length - 1];
        const next: Hex[] = [];
        for (let i = 0; i < current.length; i += 2) {
            next.push(i + 1 < current.length ? hashPair(current[i], current[i + 1]) : current[i]);
        }
        layers.push(next);
    }

    const root = layers[layers.length - 1][0];

    return {
        root,
        leaves,
        getProof(address) {
            const leaf = hashLeaf(address);
            let index = leaves.findIndex((l) => compareHashes(l, leaf) === 0);
            if (index < 0) {
                return undefined;
            }
            const proof: Hex[] = [];
            for (const layer of layers.slice(0, -1)) {
                const siblingIndex = index % 2 === 1 ? index - 1 : index + 1;
                if (siblingIndex < layer.length) {
                    proof.push(layer[siblingIndex]);
                }
                index = Math.floor(index / 2);
            }
            return proof;
        },
    };
}
