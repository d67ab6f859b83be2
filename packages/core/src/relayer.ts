import { createSystemClock, type Clock } from "./clock";
import type { Collection } from "./collection";
import { CollectionError, CollectionErrorCode } from "./errors";
import { ReentrancyGuard } from "./guard";
import { assertUint, MAX_UINT64 } from "./math";
import { isMerkleRoot, verifyAllowlistProof, ZERO_HASH } from "./merkle";
import { AccessControl } from "./roles";
import { Role, type Address, type CallContext, type Hex, type MintReceipt } from "./types";

export type MintRelayerOptions = {
    address: Address;
    admin: Address;
    collection: Collection;
    price: bigint;
    merkleRoot?: Hex;
    clock?: Clock;
};

/**
 * Sells an allowlisted window of its own and mints through the collection's
 * operator path, forwarding the payment. The relayer's address must hold
 * OPERATOR_ROLE on the collection.
 *
 * A zero start date means the window is closed; a zero end date leaves it
 * open-ended.
 */
export class MintRelayer {
    readonly address: Address;

    private readonly collection: Collection;
    private readonly clock: Clock;
    private readonly access: AccessControl;
    private readonly guard = new ReentrancyGuard();
    private price: bigint;
    private merkleRoot: Hex;
    private presaleStartDate = 0n;
    private presaleEndDate = 0n;

    constructor(opts: MintRelayerOptions) {
        this.address = opts.address;
        this.collection = opts.collection;
        this.clock = opts.clock ?? createSystemClock();
        this.access = new AccessControl({ admin: opts.admin });
        this.price = opts.price;
        this.merkleRoot = opts.merkleRoot ?? ZERO_HASH;
    }

    isOpen(): boolean {
        const now = this.clock.now();
        if (this.presaleStartDate === 0n || now < this.presaleStartDate) {
            return false;
        }
        return this.presaleEndDate === 0n || now < this.presaleEndDate;
    }

    mintRelay(ctx: CallContext, amount: bigint, proof: readonly Hex[]): MintReceipt {
        return this.guard.enter("mintRelay", () => {
            if (!this.isOpen()) {
                throw new CollectionError(CollectionErrorCode.STAGE_NOT_READY, "Relayed presale is not open", {
                    start: this.presaleStartDate.toString(),
                    end: this.presaleEndDate.toString(),
                });
            }
            assertUint("amount", amount);
            if (amount === 0n) {
                throw new CollectionError(CollectionErrorCode.ZERO_AMOUNT, "Mint amount must be greater than zero");
            }
            const paid = ctx.value ?? 0n;
            assertUint("value", paid);
            if (paid < this.price * amount) {
                throw new CollectionError(
                    CollectionErrorCode.INSUFFICIENT_PAYMENT,
                    "Payment does not cover the mint cost",
                    { required: (this.price * amount).toString(), paid: paid.toString() },
                );
            }
            if (!verifyAllowlistProof(ctx.caller, proof, this.merkleRoot)) {
                throw new CollectionError(CollectionErrorCode.INVALID_PROOF, "Invalid relayer allowlist proof", {
                    account: ctx.caller,
                });
            }
            return this.collection.operatorMint({ caller: this.address, value: paid }, ctx.caller, amount);
        });
    }

    setPresaleStartDate(ctx: CallContext, date: bigint): void {
        this.adminCall(ctx, "setPresaleStartDate", () => {
            assertUint("presaleStartDate", date, MAX_UINT64);
            this.presaleStartDate = date;
        });
    }

    setPresaleEndDate(ctx: CallContext, date: bigint): void {
        this.adminCall(ctx, "setPresaleEndDate", () => {
            assertUint("presaleEndDate", date, MAX_UINT64);
            this.presaleEndDate = date;
        });
    }

    setMerkleRoot(ctx: CallContext, root: Hex): void {
        this.adminCall(ctx, "setMerkleRoot", () => {
            if (!isMerkleRoot(root)) {
                throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Merkle root must be a 32-byte hex string");
            }
            this.merkleRoot = root;
        });
    }

    setPrice(ctx: CallContext, price: bigint): void {
        this.adminCall(ctx, "setPrice", () => {
            assertUint("price", price);
            this.price = price;
        });
    }

    getPrice(): bigint {
        return this.price;
    }

    getWindow(): { start: bigint; end: bigint } {
        return { start: this.presaleStartDate, end: this.presaleEndDate };
    }

    private adminCall(ctx: CallContext, operation: string, fn: () => void): void {
        this.guard.enter(operation, () => {
            this.access.requireRole(Role.DEFAULT_ADMIN, ctx.caller);
            fn();
        });
    }
}
