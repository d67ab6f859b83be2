import { CollectionError, CollectionErrorCode } from "./errors";

/**
 * One-call-at-a-time lock for a single instance. Any nested entry, whatever
 * the operation, is rejected while an outer call is running.
 */
export class ReentrancyGuard {
    private entered = false;

    get locked(): boolean {
        return this.entered;
    }

    enter<T>(operation: string, fn: () => T): T {
        if (this.entered) {
            throw new CollectionError(CollectionErrorCode.REENTRANT_CALL, `Re-entrant call to ${operation}`, {
                operation,
            });
        }
        this.entered = true;
        try {
            return fn();
        } finally {
            this.entered = false;
        }
    }
}
