import { CollectionError, CollectionErrorCode } from "./errors";
import type { Address, Hex, WithdrawalView } from "./types";

type WithdrawalTransaction = {
    to: Address;
    value: bigint;
    data: Hex;
    executed: boolean;
    confirmations: Set<string>;
};

/**
 * Withdrawal proposals and their confirmations. Role checks belong to the
 * caller; this class only enforces the per-transaction state machine:
 * proposed, confirmed up to the quorum, then executed for good.
 */
export class MultiApprovalTreasury {
    private readonly transactions: WithdrawalTransaction[] = [];
    readonly quorum: number;

    constructor(opts: { quorum: number }) {
        if (!Number.isInteger(opts.quorum) || opts.quorum < 1) {
            throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Quorum must be a positive integer", {
                quorum: opts.quorum,
            });
        }
        this.quorum = opts.quorum;
    }

    submit(to: Address, value: bigint, data: Hex): number {
        this.transactions.push({ to, value, data, executed: false, confirmations: new Set() });
        return this.transactions.length - 1;
    }

    confirm(index: number, approver: Address): void {
        const tx = this.pending(index);
        const key = approver.toLowerCase();
        if (tx.confirmations.has(key)) {
            throw new CollectionError(CollectionErrorCode.ALREADY_CONFIRMED, `Transaction ${index} already confirmed`, {
                index,
                approver,
            });
        }
        tx.confirmations.add(key);
    }

    revoke(index: number, approver: Address): void {
        const tx = this.pending(index);
        const key = approver.toLowerCase();
        if (!tx.confirmations.has(key)) {
            throw new CollectionError(CollectionErrorCode.NOT_CONFIRMED, `Transaction ${index} not confirmed`, {
                index,
                approver,
            });
        }
        tx.confirmations.delete(key);
    }

    /** Checks that `index` may execute now, without changing anything. */
    requireExecutable(index: number): WithdrawalView {
        const tx = this.pending(index);
        if (tx.confirmations.size < this.quorum) {
            throw new CollectionError(CollectionErrorCode.QUORUM_NOT_MET, `Transaction ${index} lacks confirmations`, {
                index,
                confirmations: tx.confirmations.size,
                quorum: this.quorum,
            });
        }
        return this.view(index, tx);
    }

    markExecuted(index: number): void {
        this.requireExecutable(index);
        this.transactions[index].executed = true;
    }

    /** Returns an executed transaction to pending after a failed transfer. */
    unmarkExecuted(index: number): void {
        this.get(index).executed = false;
    }

    getTransaction(index: number): WithdrawalView {
        return this.view(index, this.get(index));
    }

    getTransactionCount(): number {
        return this.transactions.length;
    }

    isConfirmed(index: number, approver: Address): boolean {
        return this.get(index).confirmations.has(approver.toLowerCase());
    }

    private get(index: number): WithdrawalTransaction {
        if (!Number.isInteger(index) || index < 0 || index >= this.transactions.length) {
            throw new CollectionError(CollectionErrorCode.INDEX_OUT_OF_RANGE, `Transaction ${index} does not exist`, {
                index,
                count: this.transactions.length,
            });
        }
        return this.transactions[index];
    }

    private pending(index: number): WithdrawalTransaction {
        const tx = this.get(index);
        if (tx.executed) {
            throw new CollectionError(CollectionErrorCode.ALREADY_EXECUTED, `Transaction ${index} already executed`, {
                index,
            });
        }
        return tx;
    }

    private view(index: number, tx: WithdrawalTransaction): WithdrawalView {
        return {
            index,
            to: tx.to,
            value: tx.value,
            data: tx.data,
            executed: tx.executed,
            numConfirmations: tx.confirmations.size,
        };
    }
}
