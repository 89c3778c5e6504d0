/**
 * One-time, irrevocable referee → sponsor edges forming a rooted forest.
 * The root account is seeded as its own sponsor, so every registered
 * participant has a two-hop upstream chain.
 */

import { isNullAddress } from './address.js';
import { ValidationError } from './errors.js';
import type { UserRegistered } from './events.js';
import type { MarketState } from './state.js';

export interface UpstreamChain {
    l1: string;
    l2: string;
    /** Hop 1 is the root's self-edge (principal is the root) */
    l1IsRootSelfEdge: boolean;
    /** Hop 2 is the root's self-edge (l1 is the root) */
    l2IsRootSelfEdge: boolean;
}

export class ReferralRegistry {
    constructor(private readonly state: MarketState) {}

    /** Seed the root as its own sponsor. */
    static seedRoot(state: MarketState): void {
        state.referrals.set(state.rootAccount, state.rootAccount);
    }

    /**
     * Record `caller → sponsor`. Addresses must already be normalized.
     */
    register(caller: string, sponsor: string): UserRegistered {
        if (isNullAddress(sponsor) || sponsor === caller) {
            throw new ValidationError('Not valid referrer address');
        }
        if (!this.isRegistered(sponsor)) {
            throw new ValidationError('Referrer should be registered');
        }
        if (this.isRegistered(caller)) {
            throw new ValidationError('Reference already exists');
        }

        this.state.referrals.set(caller, sponsor);
        return { type: 'UserRegistered', user: caller, sponsor };
    }

    sponsorOf(address: string): string | null {
        return this.state.referrals.get(address) ?? null;
    }

    isRegistered(address: string): boolean {
        return this.state.referrals.has(address);
    }

    /** Two-hop upstream lookup; null when the principal has no edge. */
    upstream(principal: string): UpstreamChain | null {
        const l1 = this.sponsorOf(principal);
        if (l1 === null) return null;

        // Every sponsor was registered before it could be named.
        const l2 = this.sponsorOf(l1) ?? l1;
        const root = this.state.rootAccount;

        return {
            l1,
            l2,
            l1IsRootSelfEdge: principal === root && l1 === root,
            l2IsRootSelfEdge: l1 === root && l2 === root,
        };
    }
}
