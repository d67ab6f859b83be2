import { CollectionError, CollectionErrorCode } from "./errors";

export const MAX_UINT64 = 2n ** 64n - 1n;
export const MAX_UINT256 = 2n ** 256n - 1n;

export function isUint(value: bigint, max: bigint = MAX_UINT256): boolean {
    return value >= 0n && value <= max;
}

export function assertUint(name: string, value: bigint, max: bigint = MAX_UINT256): void {
    if (!isUint(value, max)) {
        throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, `${name} is out of range`, {
            [name]: value.toString(),
        });
    }
}

/** Adds two uint64 values, clamping to MAX_UINT64 instead of wrapping. */
export function saturatingAddU64(a: bigint, b: bigint): bigint {
    const sum = a + b;
    return sum > MAX_UINT64 ? MAX_UINT64 : sum;
}
