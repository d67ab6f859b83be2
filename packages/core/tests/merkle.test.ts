import { keccak256 } from "viem";
import { describe, expect, it } from "vitest";
import {
    buildAllowlistTree,
    hashLeaf,
    hashPair,
    isMerkleRoot,
    processProof,
    verifyAllowlistProof,
    verifyProof,
    ZERO_HASH,
} from "../src/merkle";
import type { Address } from "../src/types";

const A: Address = "0x0000000000000000000000000000000000000a01";
const B: Address = "0x0000000000000000000000000000000000000a02";
const C: Address = "0x0000000000000000000000000000000000000a03";
const D: Address = "0x0000000000000000000000000000000000000a04";
const E: Address = "0x0000000000000000000000000000000000000a05";
const STRANGER: Address = "0x0000000000000000000000000000000000000bad";

describe("hashing", () => {
    it("hashes the raw address bytes for a leaf", () => {
        expect(hashLeaf(A)).toBe(keccak256(A));
    });

    it("hashes the address bytes regardless of letter case", () => {
        const lower: Address = "0x00000000000000000000000000000000000000ab";
        const upper: Address = "0x00000000000000000000000000000000000000AB";
        expect(hashLeaf(lower)).toBe(hashLeaf(upper));
    });

    it("orders each pair before hashing", () => {
        const a = hashLeaf(A);
        const b = hashLeaf(B);
        expect(hashPair(a, b)).toBe(hashPair(b, a));
    });
});

describe("buildAllowlistTree", () => {
    it("carries an odd trailing node up unchanged", () => {
        const tree = buildAllowlistTree([A, B, C]);
        const [la, lb, lc] = [A, B, C].map(hashLeaf);

        expect(tree.root).toBe(hashPair(hashPair(la, lb), lc));
        expect(tree.getProof(C)).toEqual([hashPair(la, lb)]);
        expect(tree.getProof(A)).toEqual([lb, lc]);
    });

    it("produces proofs that verify for every member", () => {
        const members = [A, B, C, D, E];
        const tree = buildAllowlistTree(members);

        for (const member of members) {
            const proof = tree.getProof(member) ?? [];
            expect(verifyAllowlistProof(member, proof, tree.root)).toBe(true);
            expect(processProof(hashLeaf(member), proof)).toBe(tree.root);
        }
    });

    it("uses the leaf itself as the root of a single-member tree", () => {
        const tree = buildAllowlistTree([A]);

        expect(tree.root).toBe(hashLeaf(A));
        expect(tree.getProof(A)).toEqual([]);
        expect(verifyAllowlistProof(A, [], tree.root)).toBe(true);
    });

    it("returns no proof for an address outside the list", () => {
        expect(buildAllowlistTree([A, B]).getProof(STRANGER)).toBeUndefined();
    });

    it("rejects an empty list", () => {
        expect(() => buildAllowlistTree([])).toThrowError(/without addresses/);
    });
});

describe("verifyProof", () => {
    const tree = buildAllowlistTree([A, B, C, D]);

    it("rejects a member's proof presented by another address", () => {
        expect(verifyAllowlistProof(STRANGER, tree.getProof(A) ?? [], tree.root)).toBe(false);
    });

    it("rejects a proof against a different root", () => {
        const other = buildAllowlistTree([E, STRANGER]);
        expect(verifyAllowlistProof(A, tree.getProof(A) ?? [], other.root)).toBe(false);
    });

    it("rejects a truncated proof", () => {
        const proof = tree.getProof(A) ?? [];
        expect(proof).toHaveLength(2);
        expect(verifyAllowlistProof(A, proof.slice(0, 1), tree.root)).toBe(false);
        expect(verifyAllowlistProof(A, [], tree.root)).toBe(false);
    });

    it("rejects malformed proof elements", () => {
        const proof = tree.getProof(A) ?? [];
        expect(verifyAllowlistProof(A, [proof[0], "0x1234"], tree.root)).toBe(false);
        expect(verifyAllowlistProof(A, [proof[0], 42], tree.root)).toBe(false);
    });

    it("fails closed on an unset root", () => {
        expect(verifyProof([], ZERO_HASH, ZERO_HASH)).toBe(false);
        expect(verifyProof([], "0x1234", ZERO_HASH)).toBe(false);
    });
});

describe("isMerkleRoot", () => {
    it("accepts only 32-byte hex strings", () => {
        expect(isMerkleRoot(ZERO_HASH)).toBe(true);
        expect(isMerkleRoot(keccak256(A))).toBe(true);
        expect(isMerkleRoot("0x1234")).toBe(false);
        expect(isMerkleRoot("1234")).toBe(false);
        expect(isMerkleRoot(undefined)).toBe(false);
    });
});
