export type Hex = `0x${string}`;

export type Address = `0x${string}`;

/**
 * Sale phases in chronological order. The numeric values are significant:
 * a later stage always compares greater than an earlier one.
 */
export enum SaleStage {
    IDLE = 0,
    PRESALE_OG = 1,
    PRESALE_WL = 2,
    PUBLIC_SALE = 3,
}

export enum Role {
    DEFAULT_ADMIN = "DEFAULT_ADMIN_ROLE",
    OPERATOR = "OPERATOR_ROLE",
}

export type AllowlistTier = "og" | "wl";

/**
 * How allowlist allocations are consumed.
 * - `per-wallet`: repeat mints allowed until the tier's wallet cap is reached.
 * - `claim-once`: a single mint of at most `maxMintPerTx`, tracked by a flag.
 */
export type AllowlistCapMode = "per-wallet" | "claim-once";

export type TierSettings = {
    price: bigint;
    maxTokenPerWallet: bigint;
    maxMintPerTx: bigint;
};

export type PublicSaleSettings = {
    price: bigint;
    date: bigint;
    maxTokenPerWallet: bigint;
    // undefined: only the cumulative wallet cap applies
    maxMintPerTx?: bigint;
};

export type WithdrawalSettings = {
    quorum: number;
    requirePublicSale: boolean;
};

export type CollectionSettings = {
    name: string;
    symbol: string;
    maxSupply: bigint;
    reservedTokens: bigint;
    presaleInterval: bigint;
    presaleDate: bigint;
    revealDate: bigint;
    og: TierSettings;
    wl: TierSettings;
    publicSale: PublicSaleSettings;
    metadataBaseURI: string;
    ogMerkleRoot: Hex;
    wlMerkleRoot: Hex;
    admin: Address;
    operators: readonly Address[];
    withdrawal: WithdrawalSettings;
    allowlistCap: AllowlistCapMode;
};

/** Admin-mutable collection parameters. */
export type CollectionConfig = {
    price: bigint;
    maxTokenPerWallet: bigint;
    presaleDate: bigint;
    publicSaleDate: bigint;
    revealDate: bigint;
    ogMerkleRoot: Hex;
    wlMerkleRoot: Hex;
    metadataBaseURI: string;
};

export type ParticipantRecord = {
    ogClaimed: boolean;
    wlClaimed: boolean;
    ogBalance: bigint;
    wlBalance: bigint;
    publicSaleBalance: bigint;
};

/** Caller identity and attached payment of a single call. */
export type CallContext = {
    caller: Address;
    value?: bigint;
};

export type MintReceipt = {
    recipient: Address;
    tokenIds: bigint[];
    paid: bigint;
};

export type WithdrawalView = {
    index: number;
    to: Address;
    value: bigint;
    data: Hex;
    executed: boolean;
    numConfirmations: number;
};
