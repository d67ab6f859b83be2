import { CollectionError, CollectionErrorCode } from "./errors";
import type { Address } from "./types";

/**
 * Token ownership bookkeeping the collection mints through. Implementations
 * must be atomic: a failed `mint` issues nothing.
 */
export interface OwnershipRegistry {
    mint(owner: Address, count: bigint): bigint[];
    balanceOf(owner: Address): bigint;
    totalSupply(): bigint;
    ownerOf(tokenId: bigint): Address;
}

/** Sequential token ids starting at 0, owners keyed case-insensitively. */
export class InMemoryOwnershipRegistry implements OwnershipRegistry {
    private readonly cap: bigint;
    private readonly owners: Address[] = [];
    private readonly balances = new Map<string, bigint>();

    constructor(opts: { cap: bigint }) {
        this.cap = opts.cap;
    }

    mint(owner: Address, count: bigint): bigint[] {
        const minted = BigInt(this.owners.length);
        if (count > this.cap - minted) {
            throw new CollectionError(CollectionErrorCode.SUPPLY_EXHAUSTED, "Mint would exceed the registry cap", {
                requested: count.toString(),
                remaining: (this.cap - minted).toString(),
            });
        }

        const tokenIds: bigint[] = [];
        for (let i = 0n; i < count; i++) {
            tokenIds.push(BigInt(this.owners.length));
            this.owners.push(owner);
        }
        const key = owner.toLowerCase();
        this.balances.set(key, (this.balances.get(key) ?? 0n) + count);
        return tokenIds;
    }

    balanceOf(owner: Address): bigint {
        return this.balances.get(owner.toLowerCase()) ?? 0n;
    }

    totalSupply(): bigint {
        return BigInt(this.owners.length);
    }

    ownerOf(tokenId: bigint): Address {
        if (tokenId < 0n || tokenId >= BigInt(this.owners.length)) {
            throw new CollectionError(CollectionErrorCode.NON_EXISTENT_TOKEN, `Token ${tokenId} does not exist`, {
                tokenId: tokenId.toString(),
            });
        }
        return this.owners[Number(tokenId)];
    }
}
