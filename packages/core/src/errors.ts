export enum CollectionErrorCode {
    ZERO_AMOUNT = "ZeroAmount",
    AMOUNT_EXCEEDS_CAP = "AmountExceedsCap",
    SUPPLY_EXHAUSTED = "SupplyExhausted",
    INSUFFICIENT_PAYMENT = "InsufficientPayment",
    INVALID_PROOF = "InvalidProof",
    STAGE_NOT_READY = "StageNotReady",
    ALREADY_CLAIMED = "AlreadyClaimed",
    NON_EXISTENT_TOKEN = "NonExistentToken",
    INDEX_OUT_OF_RANGE = "IndexOutOfRange",
    ALREADY_CONFIRMED = "AlreadyConfirmed",
    NOT_CONFIRMED = "NotConfirmed",
    QUORUM_NOT_MET = "QuorumNotMet",
    ALREADY_EXECUTED = "AlreadyExecuted",
    UNAUTHORIZED = "Unauthorized",
    REENTRANT_CALL = "ReentrantCall",
    INVALID_ARGUMENT = "InvalidArgument",
    METADATA_NOT_CONFIGURED = "MetadataNotConfigured",
    TRANSFER_FAILED = "TransferFailed",
}

export class CollectionError extends Error {
    public readonly code: CollectionErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: CollectionErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = "CollectionError";
        this.code = code;
        this.details = details;
    }
}

export function isCollectionError(err: unknown, code?: CollectionErrorCode): err is CollectionError {
    if (!(err instanceof CollectionError)) {
        return false;
    }
    return code === undefined || err.code === code;
}
