import type { Address, Hex } from "./types";

export type FundsTransfer = {
    to: Address;
    value: bigint;
    data: Hex;
};

/**
 * Moves withdrawn funds out of the collection. A transport signals failure by
 * throwing; the collection then keeps the funds and the transaction pending.
 */
export interface FundsTransport {
    transfer(transfer: FundsTransfer): void;
}

/** In-memory account balances that receive withdrawals. */
export class Ledger implements FundsTransport {
    private readonly balances = new Map<string, bigint>();
    private readonly history: FundsTransfer[] = [];

    transfer(transfer: FundsTransfer): void {
        const key = transfer.to.toLowerCase();
        this.balances.set(key, (this.balances.get(key) ?? 0n) + transfer.value);
        this.history.push(transfer);
    }

    balanceOf(account: Address): bigint {
        return this.balances.get(account.toLowerCase()) ?? 0n;
    }

    transfers(): readonly FundsTransfer[] {
        return this.history;
    }
}
