import { parseEther } from "viem";
import { describe, expect, it } from "vitest";
import { CollectionErrorCode } from "../src/errors";
import { buildAllowlistTree } from "../src/merkle";
import { MintRelayer } from "../src/relayer";
import { Role, type Address } from "../src/types";
import { ADMIN, expectCode, MINTER_1, MINTER_2, MINTER_3, OPERATOR_1, PRESALE_DATE, setup } from "./fixtures";

const RELAYER: Address = "0x00000000000000000000000000000000000000ee";
const RELAY_PRICE = parseEther("0.02");
const relayTree = buildAllowlistTree([MINTER_1, MINTER_2]);

function relayed(opts: { grant?: boolean } = {}) {
    const { clock, collection } = setup();
    if (opts.grant ?? true) {
        collection.grantRole({ caller: ADMIN }, Role.OPERATOR, RELAYER);
    }
    const relayer = new MintRelayer({
        address: RELAYER,
        admin: ADMIN,
        collection,
        price: RELAY_PRICE,
        merkleRoot: relayTree.root,
        clock,
    });
    return { clock, collection, relayer };
}

function open(relayer: MintRelayer, start = PRESALE_DATE - 100n) {
    relayer.setPresaleStartDate({ caller: ADMIN }, start);
}

describe("MintRelayer", () => {
    it("is closed until a start date is set", () => {
        const { relayer } = relayed();

        expect(relayer.isOpen()).toBe(false);
        expect(relayer.getWindow()).toEqual({ start: 0n, end: 0n });
        expectCode(
            () => relayer.mintRelay({ caller: MINTER_1, value: RELAY_PRICE }, 1n, relayTree.getProof(MINTER_1) ?? []),
            CollectionErrorCode.STAGE_NOT_READY,
        );
    });

    it("mints through the collection and forwards the payment", () => {
        const { collection, relayer } = relayed();
        open(relayer);

        const receipt = relayer.mintRelay(
            { caller: MINTER_1, value: RELAY_PRICE * 2n },
            2n,
            relayTree.getProof(MINTER_1) ?? [],
        );

        expect(receipt).toEqual({ recipient: MINTER_1, tokenIds: [50n, 51n], paid: RELAY_PRICE * 2n });
        expect(collection.balanceOf(MINTER_1)).toBe(2n);
        expect(collection.balance()).toBe(RELAY_PRICE * 2n);
        expect(collection.events().at(-1)).toMatchObject({ type: "Minted", to: MINTER_1, paid: RELAY_PRICE * 2n });
    });

    it("closes at the end date", () => {
        const { clock, relayer } = relayed();
        open(relayer);
        relayer.setPresaleEndDate({ caller: ADMIN }, PRESALE_DATE - 90n);

        expect(relayer.isOpen()).toBe(true);
        clock.advance(10n);
        expect(relayer.isOpen()).toBe(false);
    });

    it("stays closed before a future start date", () => {
        const { clock, relayer } = relayed();
        open(relayer, PRESALE_DATE);

        expect(relayer.isOpen()).toBe(false);
        clock.set(PRESALE_DATE);
        expect(relayer.isOpen()).toBe(true);
    });

    it("checks amount, payment and proof", () => {
        const { collection, relayer } = relayed();
        open(relayer);
        const proof = relayTree.getProof(MINTER_2) ?? [];

        expectCode(() => relayer.mintRelay({ caller: MINTER_2 }, 0n, proof), CollectionErrorCode.ZERO_AMOUNT);
        expectCode(
            () => relayer.mintRelay({ caller: MINTER_2, value: RELAY_PRICE - 1n }, 1n, proof),
            CollectionErrorCode.INSUFFICIENT_PAYMENT,
        );
        expectCode(
            () => relayer.mintRelay({ caller: MINTER_3, value: RELAY_PRICE }, 1n, proof),
            CollectionErrorCode.INVALID_PROOF,
        );
        expect(collection.totalSupply()).toBe(50n);
    });

    it("needs the operator role on the collection", () => {
        const { relayer } = relayed({ grant: false });
        open(relayer);

        expectCode(
            () => relayer.mintRelay({ caller: MINTER_1, value: RELAY_PRICE }, 1n, relayTree.getProof(MINTER_1) ?? []),
            CollectionErrorCode.UNAUTHORIZED,
        );
    });

    it("restricts its settings to its admin", () => {
        const { relayer } = relayed();

        expectCode(() => relayer.setPrice({ caller: OPERATOR_1 }, 1n), CollectionErrorCode.UNAUTHORIZED);
        expectCode(
            () => relayer.setMerkleRoot({ caller: ADMIN }, "0x1234"),
            CollectionErrorCode.INVALID_ARGUMENT,
        );

        relayer.setPrice({ caller: ADMIN }, parseEther("0.01"));
        expect(relayer.getPrice()).toBe(parseEther("0.01"));
    });

    it("rejects proofs after the root changes", () => {
        const { relayer } = relayed();
        open(relayer);
        relayer.setMerkleRoot({ caller: ADMIN }, buildAllowlistTree([MINTER_3]).root);

        expectCode(
            () => relayer.mintRelay({ caller: MINTER_1, value: RELAY_PRICE }, 1n, relayTree.getProof(MINTER_1) ?? []),
            CollectionErrorCode.INVALID_PROOF,
        );
        expect(relayer.mintRelay({ caller: MINTER_3, value: RELAY_PRICE }, 1n, []).tokenIds).toEqual([50n]);
    });
});
