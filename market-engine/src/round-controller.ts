/**
 * Tidemark Market: Round Controller
 *
 * Owns the singleton round record and its Sale ↔ Trade state machine:
 *
 *             startSaleRound               startTradeRound
 *   Trade ───────────────────────► Sale ───────────────────────► Trade
 *   (expired)                      │ (expired, or sold out)
 *                                  │ buySaleTokens
 *                                  ▼
 *                            inventory -= granted
 *
 * Expiry is not stored: a round is active while `now < endTime`.
 */

import { GuardViolation, ValidationError } from './errors.js';
import type {
    ReferralRewardPaid,
    SaleRoundStarted,
    SaleTokenBought,
    TradeRoundStarted,
} from './events.js';
import { costFor, nextPrice, tokensFor } from './math.js';
import type { ReferralRegistry } from './referral-registry.js';
import { type RewardRouter, splitReward } from './reward-router.js';
import type { MarketState } from './state.js';
import type { Treasury } from './treasury.js';
import type { CallContext, Round, RoundPhase, TokenLedger } from './types.js';

export interface RoundControllerDeps {
    state: MarketState;
    ledger: TokenLedger;
    treasury: Treasury;
    registry: ReferralRegistry;
    rewards: RewardRouter;
    engineAddress: string;
    seedPrice: bigint;
    tokenScale: bigint;
}

export function isRoundActive(round: Round, phase: RoundPhase, now: number): boolean {
    return round.phase === phase && now < round.endTime;
}

export function initialRound(seedPrice: bigint, seedTradeVolume: bigint): Round {
    // Trade, already expired, so the first Sale round can start at once.
    return {
        phase: 'Trade',
        endTime: 0,
        saleTokensRemaining: 0n,
        salePricePerToken: seedPrice,
        accumulatedTradeVolume: seedTradeVolume,
        saleRoundNumber: 0,
    };
}

export class RoundController {
    constructor(private readonly deps: RoundControllerDeps) {}

    private get round(): Round {
        return this.deps.state.round;
    }

    // --------------------------------------------------------
    // Guards
    // --------------------------------------------------------

    requireActive(phase: RoundPhase, now: number): void {
        if (!isRoundActive(this.round, phase, now)) {
            throw new GuardViolation('InappropriateRound');
        }
    }

    // --------------------------------------------------------
    // Transitions
    // --------------------------------------------------------

    startSaleRound(ctx: CallContext): SaleRoundStarted {
        const round = this.round;
        const tradeExpired = round.phase === 'Trade' && ctx.now >= round.endTime;
        if (round.phase === 'Sale' || (round.phase === 'Trade' && !tradeExpired)) {
            throw new GuardViolation('InappropriateRound');
        }

        const { state, ledger, engineAddress, seedPrice, tokenScale } = this.deps;
        const price = round.saleRoundNumber === 0
            ? seedPrice
            : nextPrice(round.salePricePerToken, state.priceIncrement);
        const amount = tokensFor(round.accumulatedTradeVolume, price, tokenScale);
        const endTime = ctx.now + state.roundDurationSec;

        round.phase = 'Sale';
        round.endTime = endTime;
        round.salePricePerToken = price;
        round.saleTokensRemaining = amount;
        round.accumulatedTradeVolume = 0n;
        round.saleRoundNumber += 1;

        if (amount > 0n) {
            ledger.mint(engineAddress, amount);
        }

        return { type: 'RoundStarted', phase: 'Sale', price, amount, endTime };
    }

    buySaleTokens(
        ctx: CallContext,
        payment: bigint,
    ): { bought: SaleTokenBought; rewards: ReferralRewardPaid[] } {
        this.requireActive('Sale', ctx.now);

        const round = this.round;
        const { state, ledger, treasury, registry, rewards, tokenScale } = this.deps;

        if (round.saleTokensRemaining === 0n) {
            throw new ValidationError('No tokens left');
        }

        const price = round.salePricePerToken;
        const want = tokensFor(payment, price, tokenScale);
        const granted = want < round.saleTokensRemaining ? want : round.saleTokensRemaining;
        const cost = costFor(granted, price, tokenScale);
        if (want === 0n || cost === 0n) {
            throw new ValidationError('Not enough ether to buy a token');
        }

        // Effects
        round.saleTokensRemaining -= granted;
        treasury.receive(payment);

        const split = splitReward({
            baseAmount: cost,
            rates: state.rewardConfig.sale,
            chain: registry.upstream(ctx.caller),
            fallbackSink: state.fallbackSink,
            rootRewardPolicy: state.rootRewardPolicy,
        });

        // Interactions
        ledger.transfer(ctx.caller, granted);
        treasury.send(ctx.caller, payment - cost);
        const rewardEvents = rewards.payout(split, 'Sale', ctx.caller);

        return {
            bought: { type: 'SaleTokenBought', buyer: ctx.caller, amount: granted, cost },
            rewards: rewardEvents,
        };
    }

    startTradeRound(ctx: CallContext): TradeRoundStarted {
        const round = this.round;
        const saleExpired = ctx.now >= round.endTime;
        if (round.phase === 'Trade' || !(saleExpired || round.saleTokensRemaining === 0n)) {
            throw new GuardViolation('InappropriateRound');
        }

        const { state, ledger, engineAddress } = this.deps;
        const burned = round.saleTokensRemaining;
        const endTime = ctx.now + state.roundDurationSec;

        round.saleTokensRemaining = 0n;
        round.phase = 'Trade';
        round.endTime = endTime;

        if (burned > 0n) {
            ledger.burn(engineAddress, burned);
        }

        return { type: 'RoundStarted', phase: 'Trade', burned, endTime };
    }

    /** Fold realized trade volume into the next Sale round's input. */
    recordTradeVolume(cost: bigint): void {
        this.round.accumulatedTradeVolume += cost;
    }
}
