/**
 * Shared types for allowlist tooling.
 */

export type AllowlistTier = "og" | "wl";

export type AddressRow = {
    line: number;
    value: string;
};

export type AllowlistProofs = {
    tier: AllowlistTier;
    root: `0x${string}`;
    count: number;
    proofs: Record<`0x${string}`, `0x${string}`[]>;
};
