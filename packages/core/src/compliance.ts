import { CollectionError, CollectionErrorCode } from "./errors";
import { assertUint } from "./math";
import { verifyAllowlistProof } from "./merkle";
import type { ParticipantStore } from "./participants";
import type { OwnershipRegistry } from "./registry";
import { stageName } from "./stage";
import {
    SaleStage,
    type Address,
    type AllowlistCapMode,
    type AllowlistTier,
    type CallContext,
    type CollectionConfig,
    type Hex,
    type MintReceipt,
    type TierSettings,
} from "./types";

export type ComplianceOptions = {
    registry: OwnershipRegistry;
    participants: ParticipantStore;
    maxSupply: bigint;
    og: TierSettings;
    wl: TierSettings;
    allowlistCap: AllowlistCapMode;
    publicMaxMintPerTx?: bigint;
};

const TIER_STAGE: Record<AllowlistTier, SaleStage> = {
    og: SaleStage.PRESALE_OG,
    wl: SaleStage.PRESALE_WL,
};

function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

/**
 * Validation pipeline in front of every registry mint. Each method either
 * throws before touching any state or performs exactly one registry mint and
 * then updates the participant record.
 *
 * Caps are checked before any sum involving `amount`, so every addition below
 * works on a bounded operand.
 */
export class MintComplianceEngine {
    private readonly opts: ComplianceOptions;

    constructor(opts: ComplianceOptions) {
        this.opts = opts;
    }

    get maxSupply(): bigint {
        return this.opts.maxSupply;
    }

    allowlistMint(args: {
        tier: AllowlistTier;
        ctx: CallContext;
        amount: bigint;
        proof: readonly unknown[];
        stage: SaleStage;
        root: Hex;
    }): MintReceipt {
        const { tier, ctx, amount, proof, stage, root } = args;
        const settings = this.opts[tier];
        const claimOnce = this.opts.allowlistCap === "claim-once";

        this.requireStage(stage, TIER_STAGE[tier]);
        this.requireAmount(amount);

        const perTxCap = claimOnce ? settings.maxMintPerTx : min(settings.maxMintPerTx, settings.maxTokenPerWallet);
        if (amount > perTxCap) {
            throw this.capError(`${tier.toUpperCase()} mint exceeds the per-transaction cap`, amount, perTxCap);
        }

        const record = this.opts.participants.get(ctx.caller);
        const claimed = tier === "og" ? record.ogClaimed : record.wlClaimed;
        const minted = tier === "og" ? record.ogBalance : record.wlBalance;
        if (claimOnce) {
            if (claimed) {
                throw new CollectionError(
                    CollectionErrorCode.ALREADY_CLAIMED,
                    `${tier.toUpperCase()} allocation already claimed`,
                    { account: ctx.caller },
                );
            }
        } else if (minted + amount > settings.maxTokenPerWallet) {
            throw this.capError(
                `${tier.toUpperCase()} mint exceeds the wallet cap`,
                minted + amount,
                settings.maxTokenPerWallet,
            );
        }

        this.requireSupply(amount);
        const paid = this.requirePayment(ctx, settings.price, amount);

        if (!verifyAllowlistProof(ctx.caller, proof, root)) {
            throw new CollectionError(
                CollectionErrorCode.INVALID_PROOF,
                `Invalid ${tier.toUpperCase()} allowlist proof`,
                { account: ctx.caller },
            );
        }

        const tokenIds = this.opts.registry.mint(ctx.caller, amount);
        if (tier === "og") {
            this.opts.participants.update(ctx.caller, { ogClaimed: true, ogBalance: minted + amount });
        } else {
            this.opts.participants.update(ctx.caller, { wlClaimed: true, wlBalance: minted + amount });
        }
        return { recipient: ctx.caller, tokenIds, paid };
    }

    publicMint(args: { ctx: CallContext; amount: bigint; stage: SaleStage; config: CollectionConfig }): MintReceipt {
        const { ctx, amount, stage, config } = args;

        this.requireStage(stage, SaleStage.PUBLIC_SALE);
        this.requireAmount(amount);

        const perTx = this.opts.publicMaxMintPerTx;
        if (perTx !== undefined && amount > perTx) {
            throw this.capError("Mint exceeds the per-transaction cap", amount, perTx);
        }
        if (amount > config.maxTokenPerWallet) {
            throw this.capError("Mint exceeds the wallet cap", amount, config.maxTokenPerWallet);
        }
        const record = this.opts.participants.get(ctx.caller);
        if (record.publicSaleBalance + amount > config.maxTokenPerWallet) {
            throw this.capError(
                "Mint exceeds the wallet cap",
                record.publicSaleBalance + amount,
                config.maxTokenPerWallet,
            );
        }

        this.requireSupply(amount);
        const paid = this.requirePayment(ctx, config.price, amount);

        const tokenIds = this.opts.registry.mint(ctx.caller, amount);
        this.opts.participants.update(ctx.caller, { publicSaleBalance: record.publicSaleBalance + amount });
        return { recipient: ctx.caller, tokenIds, paid };
    }

    /** Privileged path: no stage, price or proof checks. */
    operatorMint(args: { recipient: Address; amount: bigint; paid: bigint }): MintReceipt {
        this.requireAmount(args.amount);
        this.requireSupply(args.amount);
        const tokenIds = this.opts.registry.mint(args.recipient, args.amount);
        return { recipient: args.recipient, tokenIds, paid: args.paid };
    }

    private requireStage(current: SaleStage, required: SaleStage): void {
        if (current !== required) {
            throw new CollectionError(
                CollectionErrorCode.STAGE_NOT_READY,
                `Sale stage is ${stageName(current)}, expected ${stageName(required)}`,
                { current: stageName(current), required: stageName(required) },
            );
        }
    }

    private requireAmount(amount: bigint): void {
        assertUint("amount", amount);
        if (amount === 0n) {
            throw new CollectionError(CollectionErrorCode.ZERO_AMOUNT, "Mint amount must be greater than zero");
        }
    }

    private requireSupply(amount: bigint): void {
        const minted = this.opts.registry.totalSupply();
        const remaining = minted >= this.opts.maxSupply ? 0n : this.opts.maxSupply - minted;
        if (amount > remaining) {
            throw new CollectionError(CollectionErrorCode.SUPPLY_EXHAUSTED, "Mint would exceed the total supply", {
                requested: amount.toString(),
                remaining: remaining.toString(),
            });
        }
    }

    private requirePayment(ctx: CallContext, price: bigint, amount: bigint): bigint {
        const paid = ctx.value ?? 0n;
        assertUint("value", paid);
        const cost = price * amount;
        if (paid < cost) {
            throw new CollectionError(CollectionErrorCode.INSUFFICIENT_PAYMENT, "Payment does not cover the mint cost", {
                required: cost.toString(),
                paid: paid.toString(),
            });
        }
        return paid;
    }

    private capError(message: string, requested: bigint, cap: bigint): CollectionError {
        return new CollectionError(CollectionErrorCode.AMOUNT_EXCEEDS_CAP, message, {
            requested: requested.toString(),
            cap: cap.toString(),
        });
    }
}
