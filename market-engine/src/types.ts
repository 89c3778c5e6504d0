/**
 * Tidemark Market: Shared Types
 *
 * Core interfaces used across the round controller, order book,
 * referral registry, reward router and the market engine facade.
 */

// ============================================================
// Scaling
// ============================================================

/** Native currency decimals (SUI → MIST). */
export const NATIVE_DECIMALS = 9;

/** Basis-point denominator: 10000 = 100% */
export const BPS_DENOMINATOR = 10_000n;

/** Sale price escalation: price * 103 / 100 */
export const PRICE_GROWTH_NUMERATOR = 103n;
export const PRICE_GROWTH_DENOMINATOR = 100n;

// ============================================================
// Rounds
// ============================================================

export type RoundPhase = 'Sale' | 'Trade';

/**
 * The singleton round record. Exactly one exists per engine and it is
 * only mutated by the round and trade entry points.
 */
export interface Round {
    phase: RoundPhase;

    /** Unix seconds at which the current round stops being active */
    endTime: number;

    /** Tokens still for sale in the current Sale round (raw) */
    saleTokensRemaining: bigint;

    /** Price of the most recent Sale round (MIST per whole token) */
    salePricePerToken: bigint;

    /** Native volume realized by order redemptions since the last Sale round */
    accumulatedTradeVolume: bigint;

    /** Number of Sale rounds started so far; 0 until the first one */
    saleRoundNumber: number;
}

/** Round record as seen by callers, with activity evaluated at a given time. */
export interface RoundView extends Round {
    active: boolean;
}

// ============================================================
// Orders
// ============================================================

export interface Order {
    /** Monotonic id, never reused */
    id: number;

    /** Seller address */
    owner: string;

    /** MIST per whole token */
    pricePerToken: bigint;

    /** Escrowed tokens not yet redeemed (raw) */
    remainingAmount: bigint;
}

// ============================================================
// Referrals
// ============================================================

export interface PhaseRewardRates {
    /** Direct sponsor share (bps) */
    l1: number;

    /** Sponsor's sponsor share (bps) */
    l2: number;
}

export interface ReferralRewardConfig {
    sale: PhaseRewardRates;
    trade: PhaseRewardRates;
}

/**
 * Who receives a reward hop that travels the root's own self-edge.
 *
 * - `pay-root`: the root is its own sponsor, so it is paid like any sponsor.
 * - `fallback-sink`: the hop is redirected to the fallback sink.
 */
export type RootRewardPolicy = 'pay-root' | 'fallback-sink';

/** One referral payout leg. */
export interface RewardLeg {
    level: 1 | 2;
    recipient: string;
    amount: bigint;
    /** True when the leg was redirected to the fallback sink */
    toFallbackSink: boolean;
}

/** Result of splitting a trade's value between principal and sponsors. */
export interface RewardSplit {
    baseAmount: bigint;
    /** baseAmount - l1Reward - l2Reward */
    net: bigint;
    l1Reward: bigint;
    l2Reward: bigint;
    legs: RewardLeg[];
}

// ============================================================
// Collaborators
// ============================================================

/**
 * Fungible token ledger. `transfer` moves tokens out of the engine's
 * custody account; `transferFrom` moves tokens on behalf of a holder.
 */
export interface TokenLedger {
    mint(to: string, amount: bigint): void;
    burn(from: string, amount: bigint): void;
    transfer(to: string, amount: bigint): void;
    transferFrom(from: string, to: string, amount: bigint): void;
    balanceOf(address: string): bigint;
    decimals(): number;
}

/**
 * Native currency send primitive. The return value must be checked:
 * `false` aborts the whole call.
 */
export interface PaymentGateway {
    send(to: string, amount: bigint): boolean;
}

/**
 * Collaborators that can take part in whole-call rollback.
 * The engine captures a token before each call and restores it on abort.
 */
export interface Checkpointable {
    checkpoint(): unknown;
    restore(token: unknown): void;
}

// ============================================================
// Call context
// ============================================================

/** Who is calling and when (unix seconds). */
export interface CallContext {
    caller: string;
    now: number;
}

// ============================================================
// Engine configuration
// ============================================================

export interface MarketLogger {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

export interface MarketConfig {
    /** Account holding minted inventory and escrowed orders */
    engineAddress: string;

    /** Privileged caller for admin operations */
    admin: string;

    /** Pre-seeded referral root; defaults to `admin` */
    rootAccount?: string;

    /** Receives referral rewards of principals without a sponsor */
    fallbackSink: string;

    /** Length of both Sale and Trade rounds (seconds) */
    roundDurationSec?: number;

    /** Price of the first Sale round (MIST per whole token) */
    seedPrice?: bigint;

    /** Trade volume feeding the first Sale round (MIST) */
    seedTradeVolume?: bigint;

    /** Fixed increment added on every price escalation (MIST) */
    priceIncrement?: bigint;

    referralRates?: Partial<ReferralRewardConfig>;

    rootRewardPolicy?: RootRewardPolicy;

    logger?: MarketLogger;
}

/** Tunable market parameters (everything in MarketConfig but identities). */
export type MarketParams = Omit<
    MarketConfig,
    'engineAddress' | 'admin' | 'rootAccount' | 'fallbackSink' | 'logger'
>;

// ============================================================
// Metrics
// ============================================================

export interface MarketMetrics {
    callsCommitted: number;
    callsReverted: number;
    /** Tokens sold in Sale rounds (raw) */
    saleTokensSold: bigint;
    /** Native volume realized by order redemptions (MIST) */
    tradeVolume: bigint;
    /** Rewards paid to sponsors (MIST) */
    referralRewardsPaid: bigint;
    /** Rewards redirected to the fallback sink (MIST) */
    fallbackRewardsPaid: bigint;
}
