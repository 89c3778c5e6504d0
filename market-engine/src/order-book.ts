/**
 * Sell orders posted during Trade rounds. Tokens are escrowed in the
 * engine's custody on creation and leave it either to a redeemer
 * (partial or full fill) or back to the owner on removal.
 *
 * Order ids come from a monotonic counter and are never reused; a removed
 * or stale id behaves exactly like one that never existed.
 */

import { StateNotFound, ValidationError } from './errors.js';
import type { OrderAdded, OrderRedeemed, OrderRemoved, ReferralRewardPaid } from './events.js';
import { costFor, tokensFor } from './math.js';
import type { ReferralRegistry } from './referral-registry.js';
import { type RewardRouter, splitReward } from './reward-router.js';
import type { RoundController } from './round-controller.js';
import type { MarketState } from './state.js';
import type { Treasury } from './treasury.js';
import type { CallContext, Order, TokenLedger } from './types.js';

export interface OrderBookDeps {
    state: MarketState;
    ledger: TokenLedger;
    treasury: Treasury;
    registry: ReferralRegistry;
    rewards: RewardRouter;
    rounds: RoundController;
    engineAddress: string;
    tokenScale: bigint;
}

export class OrderBook {
    constructor(private readonly deps: OrderBookDeps) {}

    private get orders(): Map<number, Order> {
        return this.deps.state.orders;
    }

    getOrder(id: number): Order | null {
        const order = this.orders.get(id);
        return order ? { ...order } : null;
    }

    listOrders(): Order[] {
        return [...this.orders.values()].map((order) => ({ ...order }));
    }

    // --------------------------------------------------------
    // Entry points
    // --------------------------------------------------------

    addOrder(ctx: CallContext, amount: bigint, price: bigint): OrderAdded {
        const { state, ledger, rounds, engineAddress } = this.deps;
        rounds.requireActive('Trade', ctx.now);

        if (price <= 0n) {
            throw new ValidationError('Not valid price');
        }
        if (amount <= 0n || ledger.balanceOf(ctx.caller) < amount) {
            throw new ValidationError('Not enough tokens');
        }

        const id = state.nextOrderId;
        state.nextOrderId += 1;
        this.orders.set(id, {
            id,
            owner: ctx.caller,
            pricePerToken: price,
            remainingAmount: amount,
        });

        ledger.transferFrom(ctx.caller, engineAddress, amount);

        return { type: 'OrderAdded', orderId: id, owner: ctx.caller, amount, price };
    }

    removeOrder(ctx: CallContext, id: number): OrderRemoved {
        const order = this.orders.get(id) ?? null;
        if (order === null) {
            throw new StateNotFound('Not valid order id');
        }
        if (order.owner !== ctx.caller) {
            throw new ValidationError('Not valid order id');
        }

        const returned = order.remainingAmount;
        this.orders.delete(id);

        if (returned > 0n) {
            this.deps.ledger.transfer(order.owner, returned);
        }

        return { type: 'OrderRemoved', orderId: id, returnedAmount: returned };
    }

    redeemOrder(
        ctx: CallContext,
        id: number,
        payment: bigint,
    ): { redeemed: OrderRedeemed; rewards: ReferralRewardPaid[] } {
        const { state, ledger, treasury, registry, rewards, rounds, tokenScale } = this.deps;
        rounds.requireActive('Trade', ctx.now);

        const order = this.orders.get(id) ?? null;
        if (order === null || order.remainingAmount === 0n) {
            throw new StateNotFound("Order doesn't exist or filled");
        }

        const price = order.pricePerToken;
        const want = tokensFor(payment, price, tokenScale);
        const granted = want < order.remainingAmount ? want : order.remainingAmount;
        const cost = costFor(granted, price, tokenScale);
        if (want === 0n || cost === 0n) {
            throw new ValidationError('Not enough ether to buy a token');
        }

        // Effects
        order.remainingAmount -= granted;
        rounds.recordTradeVolume(cost);
        treasury.receive(payment);

        // Referral credit flows from the seller's chain.
        const split = splitReward({
            baseAmount: cost,
            rates: state.rewardConfig.trade,
            chain: registry.upstream(order.owner),
            fallbackSink: state.fallbackSink,
            rootRewardPolicy: state.rootRewardPolicy,
        });

        // Interactions
        ledger.transfer(ctx.caller, granted);
        treasury.send(order.owner, split.net);
        treasury.send(ctx.caller, payment - cost);
        const rewardEvents = rewards.payout(split, 'Trade', order.owner);

        return {
            redeemed: {
                type: 'OrderRedeemed',
                orderId: id,
                buyer: ctx.caller,
                amount: granted,
                price,
                cost,
            },
            rewards: rewardEvents,
        };
    }
}
