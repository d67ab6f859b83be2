import type { Address, Hex, Role, SaleStage } from "./types";

export type CollectionEvent =
    | { type: "ParameterUpdated"; name: string; value: string }
    | { type: "Minted"; to: Address; tokenIds: bigint[]; stage: SaleStage; paid: bigint }
    | { type: "WithdrawalSubmitted"; index: number; operator: Address; to: Address; value: bigint; data: Hex }
    | { type: "WithdrawalConfirmed"; index: number; operator: Address }
    | { type: "ConfirmationRevoked"; index: number; operator: Address }
    | { type: "WithdrawalExecuted"; index: number; operator: Address; to: Address; value: bigint }
    | { type: "RoleGranted"; role: Role; account: Address; sender: Address }
    | { type: "RoleRevoked"; role: Role; account: Address; sender: Address };

export type AuditRecord = CollectionEvent & { seq: number };

type Listener = (record: AuditRecord) => void;

/** Append-only record of successful state transitions. */
export class AuditLog {
    private readonly records: AuditRecord[] = [];
    private listeners: Set<Listener> = new Set();

    append(event: CollectionEvent): AuditRecord {
        const record: AuditRecord = structuredClone({ ...event, seq: this.records.length + 1 });
        this.records.push(record);
        for (const cb of this.listeners) {
            try {
                cb(structuredClone(record));
            } catch {
                // observers cannot affect the call that emitted
            }
        }
        return structuredClone(record);
    }

    /** Copies of every record, oldest first. */
    list(): AuditRecord[] {
        return this.records.map((record) => structuredClone(record));
    }

    onEvent(cb: Listener): () => void {
        this.listeners.add(cb);
        return () => this.listeners.delete(cb);
    }
}
