import type { Order, ReferralRewardConfig, RootRewardPolicy, Round } from './types.js';

/**
 * All durable engine state. Owned by one MarketEngine and threaded through
 * the round controller, order book, registry and reward router.
 */
export interface MarketState {
    round: Round;
    orders: Map<number, Order>;
    /** Next id handed out by addOrder; ids start at 1 and are never reused */
    nextOrderId: number;
    /** referee → sponsor */
    referrals: Map<string, string>;
    rewardConfig: ReferralRewardConfig;
    rootRewardPolicy: RootRewardPolicy;
    roundDurationSec: number;
    fallbackSink: string;
    admin: string;
    rootAccount: string;
    /** Native funds held by the engine (MIST) */
    treasury: bigint;
    /** Constant for the engine's lifetime */
    priceIncrement: bigint;
}

export function snapshotState(state: MarketState): MarketState {
    return structuredClone(state);
}

/** Put every field of `snapshot` back into `target`, keeping its identity. */
export function restoreState(target: MarketState, snapshot: MarketState): void {
    Object.assign(target, structuredClone(snapshot));
}
