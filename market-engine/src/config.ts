/**
 * Tidemark Market Configuration
 *
 * Defaults: 3-day rounds, a first Sale price of 0.00001 SUI per token
 * fed by 1 SUI of seed volume, and 0.000004 SUI added on every escalation.
 */

import { toAddress } from './address.js';
import { ValidationError } from './errors.js';
import type {
    MarketConfig,
    MarketLogger,
    MarketParams,
    PhaseRewardRates,
    ReferralRewardConfig,
    RootRewardPolicy,
} from './types.js';

export const DEFAULT_ROUND_DURATION_SEC = 3 * 24 * 60 * 60;

export const DEFAULT_REWARD_CONFIG: ReferralRewardConfig = {
    sale: { l1: 500, l2: 300 },
    trade: { l1: 250, l2: 250 },
};

export const DEFAULT_MARKET_PARAMS: Required<MarketParams> = {
    roundDurationSec: DEFAULT_ROUND_DURATION_SEC,
    seedPrice: 10_000n,             // 0.00001 SUI
    seedTradeVolume: 1_000_000_000n, // 1 SUI
    priceIncrement: 4_000n,          // 0.000004 SUI
    referralRates: DEFAULT_REWARD_CONFIG,
    rootRewardPolicy: 'pay-root',
};

const ROOT_REWARD_POLICIES: readonly RootRewardPolicy[] = ['pay-root', 'fallback-sink'];

/** Fully resolved configuration with normalized addresses. */
export interface ResolvedMarketConfig {
    engineAddress: string;
    admin: string;
    rootAccount: string;
    fallbackSink: string;
    roundDurationSec: number;
    seedPrice: bigint;
    seedTradeVolume: bigint;
    priceIncrement: bigint;
    rewardConfig: ReferralRewardConfig;
    rootRewardPolicy: RootRewardPolicy;
    logger: MarketLogger;
}

// ============================================================
// Validation
// ============================================================

export function validateRates(rates: PhaseRewardRates): PhaseRewardRates {
    for (const rate of [rates.l1, rates.l2]) {
        if (!Number.isInteger(rate) || rate < 0 || rate > 10_000) {
            throw new ValidationError(`Not valid reward rate: ${rate}`);
        }
    }
    if (rates.l1 + rates.l2 > 10_000) {
        throw new ValidationError('Reward rates exceed 100%');
    }
    return { l1: rates.l1, l2: rates.l2 };
}

export function validateRoundDuration(seconds: number): number {
    if (!Number.isSafeInteger(seconds) || seconds <= 0) {
        throw new ValidationError(`Not valid round duration: ${seconds}`);
    }
    return seconds;
}

export function resolveMarketConfig(config: MarketConfig): ResolvedMarketConfig {
    const admin = toAddress(config.admin, 'Not valid admin address');
    const params = { ...DEFAULT_MARKET_PARAMS, ...config };
    const rates = { ...DEFAULT_REWARD_CONFIG, ...config.referralRates };

    if (params.seedPrice <= 0n) throw new ValidationError('Not valid seed price');
    if (params.seedTradeVolume < 0n) throw new ValidationError('Not valid seed trade volume');
    if (params.priceIncrement < 0n) throw new ValidationError('Not valid price increment');
    if (!ROOT_REWARD_POLICIES.includes(params.rootRewardPolicy)) {
        throw new ValidationError(`Not valid root reward policy: ${params.rootRewardPolicy}`);
    }

    return {
        engineAddress: toAddress(config.engineAddress, 'Not valid engine address'),
        admin,
        rootAccount: config.rootAccount ? toAddress(config.rootAccount, 'Not valid root address') : admin,
        fallbackSink: toAddress(config.fallbackSink, 'Not valid fallback sink address'),
        roundDurationSec: validateRoundDuration(params.roundDurationSec),
        seedPrice: params.seedPrice,
        seedTradeVolume: params.seedTradeVolume,
        priceIncrement: params.priceIncrement,
        rewardConfig: {
            sale: validateRates(rates.sale),
            trade: validateRates(rates.trade),
        },
        rootRewardPolicy: params.rootRewardPolicy,
        logger: config.logger ?? console,
    };
}

// ============================================================
// Environment
// ============================================================

function parseBigIntVar(name: string, value: string): bigint {
    if (!/^\d+$/.test(value.trim())) {
        throw new ValidationError(`${name} must be an integer amount, got "${value}"`);
    }
    return BigInt(value.trim());
}

/**
 * Read market parameters from environment variables. Unset variables are
 * left out so the defaults apply.
 */
export function marketParamsFromEnv(env: NodeJS.ProcessEnv = process.env): MarketParams {
    const params: MarketParams = {};

    const duration = env.MARKET_ROUND_DURATION_SEC;
    if (duration !== undefined) {
        params.roundDurationSec = validateRoundDuration(Number(duration));
    }
    if (env.MARKET_SEED_PRICE !== undefined) {
        params.seedPrice = parseBigIntVar('MARKET_SEED_PRICE', env.MARKET_SEED_PRICE);
    }
    if (env.MARKET_SEED_TRADE_VOLUME !== undefined) {
        params.seedTradeVolume = parseBigIntVar('MARKET_SEED_TRADE_VOLUME', env.MARKET_SEED_TRADE_VOLUME);
    }
    if (env.MARKET_PRICE_INCREMENT !== undefined) {
        params.priceIncrement = parseBigIntVar('MARKET_PRICE_INCREMENT', env.MARKET_PRICE_INCREMENT);
    }

    const policy = env.MARKET_ROOT_REWARD_POLICY;
    if (policy !== undefined) {
        const match = ROOT_REWARD_POLICIES.find((p) => p === policy);
        if (!match) {
            throw new ValidationError(`Not valid root reward policy: ${policy}`);
        }
        params.rootRewardPolicy = match;
    }

    return params;
}
