/**
 * Tidemark Market: Sale/Trade Round Market Engine
 *
 * @module @tidemark/market-engine
 *
 * Architecture:
 *
 *   ┌─────────────────────────────────────────────────────────┐
 *   │                     MarketEngine                        │
 *   │   (atomic entry points, reentrancy flag, event log)     │
 *   └───────┬────────────────┬──────────────────┬────────────┘
 *           │                │                  │
 *   ┌───────▼───────┐ ┌─────▼──────┐  ┌───────▼─────────┐
 *   │RoundController│ │ OrderBook  │  │ReferralRegistry │
 *   │ (Sale ↔ Trade │ │ (escrow,   │  │ (sponsor edges, │
 *   │  inventory)   │ │  partials) │  │  seeded root)   │
 *   └───────┬───────┘ └─────┬──────┘  └───────┬─────────┘
 *           │                │                  │
 *           └──────┬─────────┴──────────┬───────┘
 *           ┌──────▼──────┐      ┌──────▼──────┐
 *           │ math.ts     │      │RewardRouter │
 *           │ (pricing)   │      │ + Treasury  │
 *           └─────────────┘      └─────────────┘
 *
 *   TokenLedger / PaymentGateway are external collaborators;
 *   OrderCache is a read model fed by committed events.
 */

// Core types
export {
    NATIVE_DECIMALS,
    BPS_DENOMINATOR,
    type RoundPhase,
    type Round,
    type RoundView,
    type Order,
    type PhaseRewardRates,
    type ReferralRewardConfig,
    type RootRewardPolicy,
    type RewardLeg,
    type RewardSplit,
    type TokenLedger,
    type PaymentGateway,
    type Checkpointable,
    type CallContext,
    type MarketLogger,
    type MarketConfig,
    type MarketParams,
    type MarketMetrics,
} from './types.js';

// Events
export { MARKET_EVENT_TYPES } from './events.js';
export type * from './events.js';

// Errors
export {
    MarketError,
    GuardViolation,
    ValidationError,
    StateNotFound,
    TransferFailure,
    isMarketError,
    ensureError,
    type MarketErrorKind,
    type GuardReason,
} from './errors.js';

// Addresses
export { NULL_ADDRESS, toAddress, isNullAddress } from './address.js';

// Math
export {
    tokensFor,
    costFor,
    nextPrice,
    priceAt,
    bpsShare,
    tokenScaleFor,
    toRaw,
    fromRaw,
    formatPrice,
} from './math.js';

// Configuration
export {
    DEFAULT_MARKET_PARAMS,
    DEFAULT_REWARD_CONFIG,
    DEFAULT_ROUND_DURATION_SEC,
    marketParamsFromEnv,
    resolveMarketConfig,
} from './config.js';

// Referrals
export { splitReward, type SplitInput } from './reward-router.js';
export { type UpstreamChain } from './referral-registry.js';

// Engine
export { MarketEngine, type MarketEngineDeps } from './market-engine.js';

// Read model
export {
    OrderCache,
    type CachedOrder,
    type CachedOrderStatus,
    type BudgetQuote,
    type QuoteLeg,
} from './order-cache.js';

// Reference collaborators
export { InMemoryTokenLedger, InMemoryPaymentGateway, type RecipientHook } from './in-memory.js';
