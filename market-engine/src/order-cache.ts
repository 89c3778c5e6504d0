/**
 * Tidemark Market: Order Cache
 *
 * Event-driven read model that reconstructs the order book from committed
 * market events alone. Gives quoting and display code instant access to
 * live orders without reading engine state.
 *
 * Event types consumed:
 *   OrderAdded, OrderRedeemed, OrderRemoved
 */

import type { MarketEvent } from './events.js';
import { MARKET_EVENT_TYPES } from './events.js';
import { costFor, tokensFor } from './math.js';

// ============================================================
// Types
// ============================================================

export type CachedOrderStatus = 'Open' | 'PartiallyFilled' | 'Filled' | 'Removed';

export interface CachedOrder {
    orderId: number;
    owner: string;
    pricePerToken: bigint;
    initialAmount: bigint;
    remainingAmount: bigint;
    status: CachedOrderStatus;
    /** Sequence number of the last event that touched this order */
    lastUpdatedAt: number;
}

/** One order's contribution to a budget quote. */
export interface QuoteLeg {
    orderId: number;
    amount: bigint;
    cost: bigint;
    pricePerToken: bigint;
}

export interface BudgetQuote {
    budget: bigint;
    totalAmount: bigint;
    totalCost: bigint;
    legs: QuoteLeg[];
}

// ============================================================
// Cache
// ============================================================

export class OrderCache {
    private orders: Map<number, CachedOrder> = new Map();
    private sequence = 0;
    private unsubscribe: (() => void) | null = null;

    /**
     * @param tokenScale - 10 ** token decimals, used by quoteBudget
     */
    constructor(private readonly tokenScale: bigint) {}

    // --------------------------------------------------------
    // Lifecycle
    // --------------------------------------------------------

    /** Replay the source's event log, then follow its new events. */
    attach(source: {
        events(): MarketEvent[];
        subscribe(listener: (event: MarketEvent) => void): () => void;
    }): void {
        this.detach();
        for (const event of source.events()) {
            this.processEvent(event);
        }
        this.unsubscribe = source.subscribe((event) => this.processEvent(event));
    }

    detach(): void {
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
    }

    // --------------------------------------------------------
    // Event Processing
    // --------------------------------------------------------

    processEvent(event: MarketEvent): void {
        this.sequence++;

        switch (event.type) {
            case MARKET_EVENT_TYPES.ORDER_ADDED:
                this.orders.set(event.orderId, {
                    orderId: event.orderId,
                    owner: event.owner,
                    pricePerToken: event.price,
                    initialAmount: event.amount,
                    remainingAmount: event.amount,
                    status: 'Open',
                    lastUpdatedAt: this.sequence,
                });
                break;

            case MARKET_EVENT_TYPES.ORDER_REDEEMED: {
                const order = this.orders.get(event.orderId);
                if (!order) break;
                order.remainingAmount -= event.amount;
                order.status = order.remainingAmount === 0n ? 'Filled' : 'PartiallyFilled';
                order.lastUpdatedAt = this.sequence;
                break;
            }

            case MARKET_EVENT_TYPES.ORDER_REMOVED:
                this.updateOrder(event.orderId, {
                    status: 'Removed',
                    remainingAmount: 0n,
                    lastUpdatedAt: this.sequence,
                });
                break;
        }
    }

    private updateOrder(id: number, updates: Partial<CachedOrder>): void {
        const existing = this.orders.get(id);
        if (existing) {
            Object.assign(existing, updates);
        }
    }

    // --------------------------------------------------------
    // Queries
    // --------------------------------------------------------

    /** Orders that can still be redeemed. */
    getActiveOrders(): CachedOrder[] {
        const result: CachedOrder[] = [];
        for (const order of this.orders.values()) {
            if (
                (order.status === 'Open' || order.status === 'PartiallyFilled') &&
                order.remainingAmount > 0n
            ) {
                result.push({ ...order });
            }
        }
        return result;
    }

    /** Active orders, cheapest first; ties put the larger remaining amount first. */
    getActiveOrdersSorted(): CachedOrder[] {
        return this.getActiveOrders().sort((a, b) => {
            if (a.pricePerToken < b.pricePerToken) return -1;
            if (a.pricePerToken > b.pricePerToken) return 1;
            if (a.remainingAmount > b.remainingAmount) return -1;
            if (a.remainingAmount < b.remainingAmount) return 1;
            return a.orderId - b.orderId;
        });
    }

    getOrdersByOwner(owner: string): CachedOrder[] {
        return [...this.orders.values()]
            .filter((order) => order.owner === owner)
            .map((order) => ({ ...order }));
    }

    getOrder(orderId: number): CachedOrder | undefined {
        const order = this.orders.get(orderId);
        return order ? { ...order } : undefined;
    }

    /**
     * Walk the sorted book and report how many tokens `budget` would buy,
     * using the same truncating conversions as redeemOrder.
     */
    quoteBudget(budget: bigint): BudgetQuote {
        const legs: QuoteLeg[] = [];
        let left = budget;
        let totalAmount = 0n;
        let totalCost = 0n;

        for (const order of this.getActiveOrdersSorted()) {
            if (left <= 0n) break;

            const want = tokensFor(left, order.pricePerToken, this.tokenScale);
            const amount = want < order.remainingAmount ? want : order.remainingAmount;
            // Later orders are never cheaper.
            if (want === 0n) break;
            const cost = costFor(amount, order.pricePerToken, this.tokenScale);
            if (cost === 0n) continue;

            legs.push({ orderId: order.orderId, amount, cost, pricePerToken: order.pricePerToken });
            totalAmount += amount;
            totalCost += cost;
            left -= cost;
        }

        return { budget, totalAmount, totalCost, legs };
    }

    // --------------------------------------------------------
    // Stats
    // --------------------------------------------------------

    get orderCount(): number {
        return this.orders.size;
    }

    get activeOrderCount(): number {
        return this.getActiveOrders().length;
    }

    /** Dump cache state for debugging */
    dump(): { orders: CachedOrder[] } {
        return { orders: [...this.orders.values()].map((order) => ({ ...order })) };
    }
}
