import { saturatingAddU64 } from "./math";
import { SaleStage } from "./types";

export const DEFAULT_PRESALE_INTERVAL = 900n;

export type SaleSchedule = {
    presaleDate: bigint;
    publicSaleDate: bigint;
    presaleInterval: bigint;
};

/**
 * Derives the sale stage for `now`. Checks run from the latest stage down, so
 * the result stays deterministic when `presaleDate > publicSaleDate`.
 */
export function getSaleStage(now: bigint, schedule: SaleSchedule): SaleStage {
    if (now >= schedule.publicSaleDate) {
        return SaleStage.PUBLIC_SALE;
    }
    if (now >= saturatingAddU64(schedule.presaleDate, schedule.presaleInterval)) {
        return SaleStage.PRESALE_WL;
    }
    if (now >= schedule.presaleDate) {
        return SaleStage.PRESALE_OG;
    }
    return SaleStage.IDLE;
}

export type StageWindow = {
    stage: SaleStage;
    startsAt: bigint;
};

/**
 * Lists the stages a schedule will pass through, with the time each one
 * begins. Stages that are shadowed by a later one are omitted.
 */
export function describeSchedule(schedule: SaleSchedule): StageWindow[] {
    const candidates: StageWindow[] = [
        { stage: SaleStage.PRESALE_OG, startsAt: schedule.presaleDate },
        { stage: SaleStage.PRESALE_WL, startsAt: saturatingAddU64(schedule.presaleDate, schedule.presaleInterval) },
        { stage: SaleStage.PUBLIC_SALE, startsAt: schedule.publicSaleDate },
    ];
    return candidates.filter((w) => getSaleStage(w.startsAt, schedule) === w.stage);
}

export function stageName(stage: SaleStage): string {
    return SaleStage[stage];
}
