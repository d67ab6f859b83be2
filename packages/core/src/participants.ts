import type { Address, ParticipantRecord } from "./types";

const EMPTY_RECORD: ParticipantRecord = {
    ogClaimed: false,
    wlClaimed: false,
    ogBalance: 0n,
    wlBalance: 0n,
    publicSaleBalance: 0n,
};

/** Per-address mint bookkeeping. Unknown addresses read as the empty record. */
export class ParticipantStore {
    private readonly records = new Map<string, ParticipantRecord>();

    get(account: Address): ParticipantRecord {
        return { ...(this.records.get(account.toLowerCase()) ?? EMPTY_RECORD) };
    }

    update(account: Address, patch: Partial<ParticipantRecord>): ParticipantRecord {
        const next = { ...this.get(account), ...patch };
        this.records.set(account.toLowerCase(), next);
        return { ...next };
    }

    size(): number {
        return this.records.size;
    }
}
