import { isAddress } from "viem";
import type { AddressRow } from "./types.ts";

const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

export type ValidationError = {
    type: "empty_list" | "invalid_address" | "zero_address" | "duplicate_address" | "listed_in_both_tiers";
    message: string;
    details?: Record<string, unknown>;
};

export type ValidationResult = {
    valid: boolean;
    errors: ValidationError[];
};

export function validateNotEmpty(rows: AddressRow[]): ValidationResult {
    if (rows.length > 0) {
        return { valid: true, errors: [] };
    }
    return { valid: false, errors: [{ type: "empty_list", message: `Allowlist has no addresses` }] };
}

export function validateAddressFormat(rows: AddressRow[]): ValidationResult {
    const errors: ValidationError[] = [];

    for (const row of rows) {
        if (!isAddress(row.value, { strict: false })) {
            errors.push({
                type: "invalid_address",
                message: `Invalid address`,
                details: { line: row.line, value: row.value },
            });
        } else if (row.value.toLowerCase() === ZERO_ADDRESS) {
            errors.push({
                type: "zero_address",
                message: `Zero address cannot be allowlisted`,
                details: { line: row.line },
            });
        }
    }

    return { valid: errors.length === 0, errors };
}

export function validateNoDuplicateAddresses(rows: AddressRow[]): ValidationResult {
    const errors: ValidationError[] = [];
    const seen = new Map<string, number>();

    for (const row of rows) {
        const key = row.value.toLowerCase();
        const firstLine = seen.get(key);
        if (firstLine !== undefined) {
            errors.push({
                type: "duplicate_address",
                message: `Duplicate address in CSV`,
                details: { line: row.line, firstLine, value: row.value },
            });
            continue;
        }
        seen.set(key, row.line);
    }

    return { valid: errors.length === 0, errors };
}

/**
 * OG members mint in the first presale window; listing them on the WL too
 * would give them a second allocation.
 */
export function validateTiersDisjoint(ogRows: AddressRow[], wlRows: AddressRow[]): ValidationResult {
    const errors: ValidationError[] = [];
    const og = new Set(ogRows.map((r) => r.value.toLowerCase()));

    for (const row of wlRows) {
        if (og.has(row.value.toLowerCase())) {
            errors.push({
                type: "listed_in_both_tiers",
                message: `Address is listed in both OG and WL`,
                details: { line: row.line, value: row.value },
            });
        }
    }

    return { valid: errors.length === 0, errors };
}

export function validateAllowlist(rows: AddressRow[], otherTierRows?: AddressRow[]): ValidationResult {
    const allErrors: ValidationError[] = [];

    allErrors.push(...validateNotEmpty(rows).errors);
    allErrors.push(...validateAddressFormat(rows).errors);
    allErrors.push(...validateNoDuplicateAddresses(rows).errors);

    if (otherTierRows) {
        allErrors.push(...validateTiersDisjoint(otherTierRows, rows).errors);
    }

    return { valid: allErrors.length === 0, errors: allErrors };
}

export function formatValidationErrors(result: ValidationResult): string {
    return result.errors.map((e) => `  - [${e.type}] ${e.message}: ${JSON.stringify(e.details ?? {})}`).join("\n");
}
