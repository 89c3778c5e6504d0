/**
 * Tidemark Market: Reward Router
 *
 * Splits a trade's value into the principal's net share plus two referral
 * shares. Rewards of a principal without a sponsor are carved out of the
 * same base and sent to the fallback sink, so on every path:
 *
 *   net + l1Reward + l2Reward == baseAmount
 */

import { bpsShare } from './math.js';
import type { ReferralRewardPaid } from './events.js';
import type { UpstreamChain } from './referral-registry.js';
import type { Treasury } from './treasury.js';
import type {
    PhaseRewardRates,
    RewardLeg,
    RewardSplit,
    RootRewardPolicy,
    RoundPhase,
} from './types.js';

export interface SplitInput {
    baseAmount: bigint;
    rates: PhaseRewardRates;
    /** Upstream chain of the principal, or null when unregistered */
    chain: UpstreamChain | null;
    fallbackSink: string;
    rootRewardPolicy: RootRewardPolicy;
}

/** Pure split; no funds move. */
export function splitReward(input: SplitInput): RewardSplit {
    const { baseAmount, rates, chain, fallbackSink, rootRewardPolicy } = input;

    const l1Reward = bpsShare(baseAmount, rates.l1);
    const l2Reward = bpsShare(baseAmount, rates.l2);
    const net = baseAmount - l1Reward - l2Reward;

    const legs: RewardLeg[] = [];
    if (chain === null) {
        legs.push(
            { level: 1, recipient: fallbackSink, amount: l1Reward, toFallbackSink: true },
            { level: 2, recipient: fallbackSink, amount: l2Reward, toFallbackSink: true },
        );
    } else {
        const redirect = rootRewardPolicy === 'fallback-sink';
        const l1ToSink = redirect && chain.l1IsRootSelfEdge;
        const l2ToSink = redirect && chain.l2IsRootSelfEdge;
        legs.push(
            {
                level: 1,
                recipient: l1ToSink ? fallbackSink : chain.l1,
                amount: l1Reward,
                toFallbackSink: l1ToSink,
            },
            {
                level: 2,
                recipient: l2ToSink ? fallbackSink : chain.l2,
                amount: l2Reward,
                toFallbackSink: l2ToSink,
            },
        );
    }

    return { baseAmount, net, l1Reward, l2Reward, legs };
}

export class RewardRouter {
    constructor(private readonly treasury: Treasury) {}

    /**
     * Send every non-zero leg of `split` out of the treasury.
     * The net share is left for the caller to route.
     */
    payout(split: RewardSplit, phase: RoundPhase, principal: string): ReferralRewardPaid[] {
        const paid: ReferralRewardPaid[] = [];
        for (const leg of split.legs) {
            if (leg.amount === 0n) continue;
            this.treasury.send(leg.recipient, leg.amount);
            paid.push({
                type: 'ReferralRewardPaid',
                phase,
                principal,
                level: leg.level,
                recipient: leg.recipient,
                amount: leg.amount,
                toFallbackSink: leg.toFallbackSink,
            });
        }
        return paid;
    }
}
