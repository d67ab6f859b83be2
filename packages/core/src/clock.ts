/** Source of the current unix time, in seconds. */
export interface Clock {
    now(): bigint;
}

export interface ManualClock extends Clock {
    set(timestamp: bigint): void;
    advance(seconds: bigint): void;
}

export function createSystemClock(): Clock {
    return {
        now() {
            return BigInt(Math.floor(Date.now() / 1000));
        },
    };
}

export function createManualClock(start: bigint = 0n): ManualClock {
    let current = start;
    return {
        now() {
            return current;
        },
        set(timestamp) {
            current = timestamp;
        },
        advance(seconds) {
            current += seconds;
        },
    };
}
