import { isAddress, isHex } from "viem";
import { createSystemClock, type Clock } from "./clock";
import { MintComplianceEngine } from "./compliance";
import { CollectionError, CollectionErrorCode } from "./errors";
import { AuditLog, type AuditRecord, type CollectionEvent } from "./events";
import { Ledger, type FundsTransport } from "./funds";
import { ReentrancyGuard } from "./guard";
import { noopLogger, type LoggerLike } from "./logger";
import { assertUint, MAX_UINT64 } from "./math";
import { isMerkleRoot } from "./merkle";
import { ParticipantStore } from "./participants";
import { InMemoryOwnershipRegistry, type OwnershipRegistry } from "./registry";
import { AccessControl } from "./roles";
import { getSaleStage, stageName } from "./stage";
import { MultiApprovalTreasury } from "./treasury";
import {
    Role,
    SaleStage,
    type Address,
    type CallContext,
    type CollectionConfig,
    type CollectionSettings,
    type Hex,
    type MintReceipt,
    type ParticipantRecord,
    type WithdrawalView,
} from "./types";

export type CollectionOptions = {
    registry?: OwnershipRegistry;
    clock?: Clock;
    transport?: FundsTransport;
    logger?: LoggerLike;
};

const PRIVILEGED: readonly Role[] = [Role.OPERATOR, Role.DEFAULT_ADMIN];

function copySettings(settings: CollectionSettings): CollectionSettings {
    return {
        ...settings,
        og: { ...settings.og },
        wl: { ...settings.wl },
        publicSale: { ...settings.publicSale },
        operators: [...settings.operators],
        withdrawal: { ...settings.withdrawal },
    };
}

/**
 * A single collection instance: sale configuration, supply, roles, treasury
 * and audit log behind one call surface. Every mutating method takes the
 * caller's {@link CallContext} first and runs under the instance's
 * re-entrancy guard.
 */
export class Collection {
    readonly name: string;
    readonly symbol: string;

    private readonly settings: CollectionSettings;
    private readonly config: CollectionConfig;
    private readonly registry: OwnershipRegistry;
    private readonly clock: Clock;
    private readonly transport: FundsTransport;
    private readonly logger: LoggerLike;
    private readonly access: AccessControl;
    private readonly guard = new ReentrancyGuard();
    private readonly audit = new AuditLog();
    private readonly participants = new ParticipantStore();
    private readonly engine: MintComplianceEngine;
    private readonly treasury: MultiApprovalTreasury;
    private funds = 0n;

    constructor(input: CollectionSettings, opts: CollectionOptions = {}) {
        const settings = copySettings(input);
        this.settings = settings;
        this.name = settings.name;
        this.symbol = settings.symbol;
        this.config = {
            price: settings.publicSale.price,
            maxTokenPerWallet: settings.publicSale.maxTokenPerWallet,
            presaleDate: settings.presaleDate,
            publicSaleDate: settings.publicSale.date,
            revealDate: settings.revealDate,
            ogMerkleRoot: settings.ogMerkleRoot,
            wlMerkleRoot: settings.wlMerkleRoot,
            metadataBaseURI: settings.metadataBaseURI,
        };
        this.registry = opts.registry ?? new InMemoryOwnershipRegistry({ cap: settings.maxSupply });
        this.clock = opts.clock ?? createSystemClock();
        this.transport = opts.transport ?? new Ledger();
        this.logger = opts.logger ?? noopLogger;
        this.access = new AccessControl({ admin: settings.admin, operators: settings.operators });
        this.treasury = new MultiApprovalTreasury({ quorum: settings.withdrawal.quorum });
        this.engine = new MintComplianceEngine({
            registry: this.registry,
            participants: this.participants,
            maxSupply: settings.maxSupply,
            og: settings.og,
            wl: settings.wl,
            allowlistCap: settings.allowlistCap,
            publicMaxMintPerTx: settings.publicSale.maxMintPerTx,
        });

        if (settings.reservedTokens > 0n) {
            const receipt = this.engine.operatorMint({
                recipient: settings.admin,
                amount: settings.reservedTokens,
                paid: 0n,
            });
            this.recordMint(receipt, this.getSaleStage());
        }
    }

    // ── Mint ──

    ogMint(ctx: CallContext, amount: bigint, proof: readonly Hex[]): MintReceipt {
        return this.guard.enter("ogMint", () => {
            const stage = this.getSaleStage();
            const receipt = this.engine.allowlistMint({
                tier: "og",
                ctx,
                amount,
                proof,
                stage,
                root: this.config.ogMerkleRoot,
            });
            return this.recordMint(receipt, stage);
        });
    }

    wlMint(ctx: CallContext, amount: bigint, proof: readonly Hex[]): MintReceipt {
        return this.guard.enter("wlMint", () => {
            const stage = this.getSaleStage();
            const receipt = this.engine.allowlistMint({
                tier: "wl",
                ctx,
                amount,
                proof,
                stage,
                root: this.config.wlMerkleRoot,
            });
            return this.recordMint(receipt, stage);
        });
    }

    mint(ctx: CallContext, amount: bigint): MintReceipt {
        return this.guard.enter("mint", () => {
            const stage = this.getSaleStage();
            const receipt = this.engine.publicMint({ ctx, amount, stage, config: this.config });
            return this.recordMint(receipt, stage);
        });
    }

    operatorMint(ctx: CallContext, recipient: Address, amount: bigint): MintReceipt {
        return this.guard.enter("operatorMint", () => {
            this.access.requireRole(PRIVILEGED, ctx.caller);
            const paid = ctx.value ?? 0n;
            assertUint("value", paid);
            const receipt = this.engine.operatorMint({ recipient, amount, paid });
            return this.recordMint(receipt, this.getSaleStage());
        });
    }

    // ── Withdrawals ──

    submitWithdrawal(ctx: CallContext, to: Address, value: bigint, data: Hex = "0x"): number {
        return this.guard.enter("submitWithdrawal", () => {
            this.access.requireRole(PRIVILEGED, ctx.caller);
            this.requireNoValue(ctx);
            assertUint("value", value);
            if (!isAddress(to, { strict: false })) {
                throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Withdrawal recipient is not an address", {
                    to,
                });
            }
            if (!isHex(data)) {
                throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Withdrawal data must be hex", { data });
            }
            const index = this.treasury.submit(to, value, data);
            this.emit({ type: "WithdrawalSubmitted", index, operator: ctx.caller, to, value, data });
            return index;
        });
    }

    confirmWithdrawal(ctx: CallContext, index: number): void {
        this.guard.enter("confirmWithdrawal", () => {
            this.access.requireRole(PRIVILEGED, ctx.caller);
            this.requireNoValue(ctx);
            this.treasury.confirm(index, ctx.caller);
            this.emit({ type: "WithdrawalConfirmed", index, operator: ctx.caller });
        });
    }

    revokeConfirmation(ctx: CallContext, index: number): void {
        this.guard.enter("revokeConfirmation", () => {
            this.access.requireRole(PRIVILEGED, ctx.caller);
            this.requireNoValue(ctx);
            this.treasury.revoke(index, ctx.caller);
            this.emit({ type: "ConfirmationRevoked", index, operator: ctx.caller });
        });
    }

    /**
     * Sends a confirmed withdrawal. Besides the quorum, this requires the
     * public sale to have started (when configured) and a metadata base URI
     * to be set; the latter is a readiness gate for the deployment, not a
     * condition on the funds.
     */
    executeWithdrawal(ctx: CallContext, index: number): WithdrawalView {
        return this.guard.enter("executeWithdrawal", () => {
            this.access.requireRole(Role.DEFAULT_ADMIN, ctx.caller);
            this.requireNoValue(ctx);

            const stage = this.getSaleStage();
            if (this.settings.withdrawal.requirePublicSale && stage !== SaleStage.PUBLIC_SALE) {
                throw new CollectionError(
                    CollectionErrorCode.STAGE_NOT_READY,
                    `Withdrawals open in PUBLIC_SALE, current stage is ${stageName(stage)}`,
                    { current: stageName(stage), required: stageName(SaleStage.PUBLIC_SALE) },
                );
            }
            if (this.config.metadataBaseURI === "") {
                throw new CollectionError(
                    CollectionErrorCode.METADATA_NOT_CONFIGURED,
                    "Metadata base URI must be set before withdrawing",
                );
            }

            const tx = this.treasury.requireExecutable(index);
            if (tx.value > this.funds) {
                throw new CollectionError(CollectionErrorCode.TRANSFER_FAILED, "Collection balance is too low", {
                    index,
                    value: tx.value.toString(),
                    balance: this.funds.toString(),
                });
            }

            this.treasury.markExecuted(index);
            this.funds -= tx.value;
            try {
                this.transport.transfer({ to: tx.to, value: tx.value, data: tx.data });
            } catch (err) {
                this.treasury.unmarkExecuted(index);
                this.funds += tx.value;
                this.logger.warn(`Withdrawal ${index} transfer failed`, err);
                throw new CollectionError(CollectionErrorCode.TRANSFER_FAILED, `Transfer for transaction ${index} failed`, {
                    index,
                    cause: err instanceof Error ? err.message : String(err),
                });
            }

            this.emit({ type: "WithdrawalExecuted", index, operator: ctx.caller, to: tx.to, value: tx.value });
            this.logger.info(`Withdrawal ${index} executed: ${tx.value} to ${tx.to}`);
            return this.treasury.getTransaction(index);
        });
    }

    // ── Admin setters ──

    setPrice(ctx: CallContext, price: bigint): void {
        this.updateParameter(ctx, "price", () => {
            assertUint("price", price);
            this.config.price = price;
            return price.toString();
        });
    }

    setMaxTokenPerWallet(ctx: CallContext, maxTokenPerWallet: bigint): void {
        this.updateParameter(ctx, "maxTokenPerWallet", () => {
            assertUint("maxTokenPerWallet", maxTokenPerWallet);
            this.config.maxTokenPerWallet = maxTokenPerWallet;
            return maxTokenPerWallet.toString();
        });
    }

    setMetadataBaseURI(ctx: CallContext, uri: string): void {
        this.updateParameter(ctx, "metadataBaseURI", () => {
            this.config.metadataBaseURI = uri;
            return uri;
        });
    }

    setOgMerkleRoot(ctx: CallContext, root: Hex): void {
        this.updateParameter(ctx, "ogMerkleRoot", () => {
            this.requireIdle("ogMerkleRoot");
            this.config.ogMerkleRoot = this.requireRoot(root);
            return root;
        });
    }

    setWlMerkleRoot(ctx: CallContext, root: Hex): void {
        this.updateParameter(ctx, "wlMerkleRoot", () => {
            this.requireIdle("wlMerkleRoot");
            this.config.wlMerkleRoot = this.requireRoot(root);
            return root;
        });
    }

    setPresaleDate(ctx: CallContext, date: bigint): void {
        this.updateParameter(ctx, "presaleDate", () => {
            this.requireIdle("presaleDate");
            assertUint("presaleDate", date, MAX_UINT64);
            this.config.presaleDate = date;
            return date.toString();
        });
    }

    setPublicSaleDate(ctx: CallContext, date: bigint): void {
        this.updateParameter(ctx, "publicSaleDate", () => {
            this.requireIdle("publicSaleDate");
            assertUint("publicSaleDate", date, MAX_UINT64);
            this.config.publicSaleDate = date;
            return date.toString();
        });
    }

    setRevealDate(ctx: CallContext, date: bigint): void {
        this.updateParameter(ctx, "revealDate", () => {
            assertUint("revealDate", date, MAX_UINT64);
            this.config.revealDate = date;
            return date.toString();
        });
    }

    // ── Roles ──

    grantRole(ctx: CallContext, role: Role, account: Address): void {
        this.guard.enter("grantRole", () => {
            if (this.access.grantRole(ctx.caller, role, account)) {
                this.emit({ type: "RoleGranted", role, account, sender: ctx.caller });
            }
        });
    }

    revokeRole(ctx: CallContext, role: Role, account: Address): void {
        this.guard.enter("revokeRole", () => {
            if (this.access.revokeRole(ctx.caller, role, account)) {
                this.emit({ type: "RoleRevoked", role, account, sender: ctx.caller });
            }
        });
    }

    renounceRole(ctx: CallContext, role: Role): void {
        this.guard.enter("renounceRole", () => {
            if (this.access.renounceRole(ctx.caller, role)) {
                this.emit({ type: "RoleRevoked", role, account: ctx.caller, sender: ctx.caller });
            }
        });
    }

    hasRole(role: Role, account: Address): boolean {
        return this.access.hasRole(role, account);
    }

    // ── Views ──

    getSaleStage(): SaleStage {
        return getSaleStage(this.clock.now(), {
            presaleDate: this.config.presaleDate,
            publicSaleDate: this.config.publicSaleDate,
            presaleInterval: this.settings.presaleInterval,
        });
    }

    getConfig(): CollectionConfig {
        return { ...this.config };
    }

    /** Settings as given at creation; later setter changes show in {@link getConfig}. */
    getSettings(): CollectionSettings {
        return copySettings(this.settings);
    }

    getParticipant(account: Address): ParticipantRecord {
        return this.participants.get(account);
    }

    totalSupply(): bigint {
        return this.registry.totalSupply();
    }

    balanceOf(owner: Address): bigint {
        return this.registry.balanceOf(owner);
    }

    ownerOf(tokenId: bigint): Address {
        return this.registry.ownerOf(tokenId);
    }

    /** Funds held by the collection, in wei. */
    balance(): bigint {
        return this.funds;
    }

    getTransaction(index: number): WithdrawalView {
        return this.treasury.getTransaction(index);
    }

    getTransactionCount(): number {
        return this.treasury.getTransactionCount();
    }

    isConfirmed(index: number, approver: Address): boolean {
        return this.treasury.isConfirmed(index, approver);
    }

    get quorum(): number {
        return this.treasury.quorum;
    }

    events(): AuditRecord[] {
        return this.audit.list();
    }

    onEvent(cb: (record: AuditRecord) => void): () => void {
        return this.audit.onEvent(cb);
    }

    // ── Internals ──

    private recordMint(receipt: MintReceipt, stage: SaleStage): MintReceipt {
        this.funds += receipt.paid;
        this.emit({
            type: "Minted",
            to: receipt.recipient,
            tokenIds: [...receipt.tokenIds],
            stage,
            paid: receipt.paid,
        });
        this.logger.debug(`Minted ${receipt.tokenIds.length} token(s) to ${receipt.recipient} in ${stageName(stage)}`);
        return receipt;
    }

    private updateParameter(ctx: CallContext, name: string, apply: () => string): void {
        this.guard.enter(`set ${name}`, () => {
            this.access.requireRole(Role.DEFAULT_ADMIN, ctx.caller);
            this.requireNoValue(ctx);
            const value = apply();
            this.emit({ type: "ParameterUpdated", name, value });
        });
    }

    private requireIdle(name: string): void {
        const stage = this.getSaleStage();
        if (stage !== SaleStage.IDLE) {
            throw new CollectionError(
                CollectionErrorCode.STAGE_NOT_READY,
                `${name} can only change before the presale, current stage is ${stageName(stage)}`,
                { current: stageName(stage), required: stageName(SaleStage.IDLE) },
            );
        }
    }

    private requireRoot(root: Hex): Hex {
        if (!isMerkleRoot(root)) {
            throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Merkle root must be a 32-byte hex string", {
                root,
            });
        }
        return root;
    }

    private requireNoValue(ctx: CallContext): void {
        if (ctx.value !== undefined && ctx.value !== 0n) {
            throw new CollectionError(CollectionErrorCode.INVALID_ARGUMENT, "Call does not accept payment", {
                value: ctx.value.toString(),
            });
        }
    }

    private emit(event: CollectionEvent): void {
        this.audit.append(event);
    }
}
