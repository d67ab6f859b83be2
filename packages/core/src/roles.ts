import { CollectionError, CollectionErrorCode } from "./errors";
import { Role, type Address } from "./types";

function key(account: Address): string {
    return account.toLowerCase();
}

/**
 * Role membership for one collection instance. Only DEFAULT_ADMIN holders may
 * grant or revoke; any holder may renounce its own role.
 */
export class AccessControl {
    private readonly members = new Map<Role, Set<string>>();

    constructor(initial: { admin: Address; operators?: readonly Address[] }) {
        this.add(Role.DEFAULT_ADMIN, initial.admin);
        for (const operator of initial.operators ?? []) {
            this.add(Role.OPERATOR, operator);
        }
    }

    hasRole(role: Role, account: Address): boolean {
        return this.members.get(role)?.has(key(account)) ?? false;
    }

    hasAnyRole(roles: readonly Role[], account: Address): boolean {
        return roles.some((role) => this.hasRole(role, account));
    }

    requireRole(roles: Role | readonly Role[], account: Address): void {
        const required = typeof roles === "string" ? [roles] : roles;
        if (!this.hasAnyRole(required, account)) {
            throw new CollectionError(CollectionErrorCode.UNAUTHORIZED, `Account ${account} is missing a required role`, {
                account,
                roles: [...required],
            });
        }
    }

    /** Returns false when the account already held the role. */
    grantRole(caller: Address, role: Role, account: Address): boolean {
        this.requireRole(Role.DEFAULT_ADMIN, caller);
        return this.add(role, account);
    }

    /** Returns false when the account did not hold the role. */
    revokeRole(caller: Address, role: Role, account: Address): boolean {
        this.requireRole(Role.DEFAULT_ADMIN, caller);
        return this.members.get(role)?.delete(key(account)) ?? false;
    }

    renounceRole(caller: Address, role: Role): boolean {
        return this.members.get(role)?.delete(key(caller)) ?? false;
    }

    private add(role: Role, account: Address): boolean {
        let set = this.members.get(role);
        if (!set) {
            set = new Set();
            this.members.set(role, set);
        }
        if (set.has(key(account))) {
            return false;
        }
        set.add(key(account));
        return true;
    }
}
