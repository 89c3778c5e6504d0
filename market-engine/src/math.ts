/**
 * Tidemark Market: Pricing Engine
 *
 * Pure conversion and escalation math. Everything is bigint and every
 * division truncates toward zero, so a conversion can only round in the
 * engine's favour. A zero result means "insufficient input"; callers
 * must abort rather than treat it as a free transaction.
 *
 * Price representation: MIST per one whole token.
 * tokenScale = 10 ** ledger decimals.
 */

import {
    BPS_DENOMINATOR,
    NATIVE_DECIMALS,
    PRICE_GROWTH_DENOMINATOR,
    PRICE_GROWTH_NUMERATOR,
} from './types.js';

// ============================================================
// Core Pricing Functions
// ============================================================

/**
 * How many raw tokens a native amount buys at a price.
 *
 * Formula: floor(nativeAmount * tokenScale / pricePerToken)
 */
export function tokensFor(
    nativeAmount: bigint,
    pricePerToken: bigint,
    tokenScale: bigint,
): bigint {
    if (pricePerToken <= 0n) throw new RangeError('Price must be positive');
    return (nativeAmount * tokenScale) / pricePerToken;
}

/**
 * Native cost of a raw token amount at a price.
 *
 * Formula: floor(tokenAmount * pricePerToken / tokenScale)
 */
export function costFor(
    tokenAmount: bigint,
    pricePerToken: bigint,
    tokenScale: bigint,
): bigint {
    if (tokenScale <= 0n) throw new RangeError('Token scale must be positive');
    return (tokenAmount * pricePerToken) / tokenScale;
}

/**
 * Sale price following `previous`.
 *
 * Formula: floor(previous * 103 / 100) + increment
 */
export function nextPrice(previous: bigint, increment: bigint): bigint {
    return (previous * PRICE_GROWTH_NUMERATOR) / PRICE_GROWTH_DENOMINATOR + increment;
}

/** n-th Sale price (1-based) starting from the seed. */
export function priceAt(round: number, seed: bigint, increment: bigint): bigint {
    if (!Number.isInteger(round) || round < 1) {
        throw new RangeError(`Round must be a positive integer, got ${round}`);
    }
    let price = seed;
    for (let i = 1; i < round; i++) {
        price = nextPrice(price, increment);
    }
    return price;
}

/** floor(amount * rate / 10000) */
export function bpsShare(amount: bigint, rateBps: number): bigint {
    return (amount * BigInt(rateBps)) / BPS_DENOMINATOR;
}

export function tokenScaleFor(decimals: number): bigint {
    if (!Number.isInteger(decimals) || decimals < 0) {
        throw new RangeError(`Invalid decimals: ${decimals}`);
    }
    return 10n ** BigInt(decimals);
}

// ============================================================
// Utilities
// ============================================================

/** Convert a human-readable amount to raw (with decimals) */
export function toRaw(amount: number, decimals: number): bigint {
    return BigInt(Math.round(amount * (10 ** decimals)));
}

/** Convert raw amount to human-readable */
export function fromRaw(amount: bigint, decimals: number): number {
    return Number(amount) / (10 ** decimals);
}

/** Format a MIST price per token as SUI, e.g. 14300n → "0.0000143" */
export function formatPrice(price: bigint, decimals: number = NATIVE_DECIMALS): string {
    const scale = 10n ** BigInt(decimals);
    const whole = price / scale;
    const fraction = (price % scale).toString().padStart(decimals, '0').replace(/0+$/, '');
    return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}
