/**
 * Every committed call appends its events to the engine log, in order.
 * Events of an aborted call are discarded with the rest of its effects.
 */

import type { PhaseRewardRates, RoundPhase } from './types.js';

export const MARKET_EVENT_TYPES = {
    ROUND_STARTED: 'RoundStarted',
    SALE_TOKEN_BOUGHT: 'SaleTokenBought',
    ORDER_ADDED: 'OrderAdded',
    ORDER_REMOVED: 'OrderRemoved',
    ORDER_REDEEMED: 'OrderRedeemed',
    USER_REGISTERED: 'UserRegistered',
    REFERRAL_REWARD_PAID: 'ReferralRewardPaid',
    REF_REWARD_CONFIG_UPDATED: 'RefRewardConfigUpdated',
    ROUND_DURATION_UPDATED: 'RoundDurationUpdated',
    FALLBACK_SINK_UPDATED: 'FallbackSinkUpdated',
    FUNDS_WITHDRAWN: 'FundsWithdrawn',
    ADMIN_TRANSFERRED: 'AdminTransferred',
} as const;

export type SaleRoundStarted = {
    type: 'RoundStarted';
    phase: 'Sale';
    price: bigint;
    amount: bigint;
    endTime: number;
};

export type TradeRoundStarted = {
    type: 'RoundStarted';
    phase: 'Trade';
    /** Unsold sale inventory burned on the way in */
    burned: bigint;
    endTime: number;
};

export type SaleTokenBought = {
    type: 'SaleTokenBought';
    buyer: string;
    amount: bigint;
    cost: bigint;
};

export type OrderAdded = {
    type: 'OrderAdded';
    orderId: number;
    owner: string;
    amount: bigint;
    price: bigint;
};

export type OrderRemoved = {
    type: 'OrderRemoved';
    orderId: number;
    returnedAmount: bigint;
};

export type OrderRedeemed = {
    type: 'OrderRedeemed';
    orderId: number;
    buyer: string;
    amount: bigint;
    price: bigint;
    cost: bigint;
};

export type UserRegistered = {
    type: 'UserRegistered';
    user: string;
    sponsor: string;
};

export type ReferralRewardPaid = {
    type: 'ReferralRewardPaid';
    phase: RoundPhase;
    principal: string;
    level: 1 | 2;
    recipient: string;
    amount: bigint;
    toFallbackSink: boolean;
};

export type RefRewardConfigUpdated = {
    type: 'RefRewardConfigUpdated';
    phase: RoundPhase;
    rates: PhaseRewardRates;
};

export type RoundDurationUpdated = {
    type: 'RoundDurationUpdated';
    seconds: number;
};

export type FallbackSinkUpdated = {
    type: 'FallbackSinkUpdated';
    sink: string;
};

export type FundsWithdrawn = {
    type: 'FundsWithdrawn';
    to: string;
    amount: bigint;
};

export type AdminTransferred = {
    type: 'AdminTransferred';
    previousAdmin: string;
    newAdmin: string;
};

export type MarketEvent =
    | SaleRoundStarted
    | TradeRoundStarted
    | SaleTokenBought
    | OrderAdded
    | OrderRemoved
    | OrderRedeemed
    | UserRegistered
    | ReferralRewardPaid
    | RefRewardConfigUpdated
    | RoundDurationUpdated
    | FallbackSinkUpdated
    | FundsWithdrawn
    | AdminTransferred;

export type MarketEventListener = (event: MarketEvent) => void;
