import { describe, it, expect, beforeEach } from 'vitest';
import { OrderCache } from '../order-cache.js';
import { ALICE, BOB, CAROL, DAVE, at, createMarket } from './fixtures.js';

const SCALE = 1_000_000n;

describe('OrderCache', () => {
    let cache: OrderCache;

    beforeEach(() => {
        cache = new OrderCache(SCALE);
        cache.processEvent({ type: 'OrderAdded', orderId: 1, owner: ALICE, amount: 1_000_000n, price: 200_000n });
        cache.processEvent({ type: 'OrderAdded', orderId: 2, owner: BOB, amount: 2_000_000n, price: 100_000n });
        cache.processEvent({ type: 'OrderAdded', orderId: 3, owner: ALICE, amount: 5_000_000n, price: 100_000n });
    });

    it('tracks fills and removals', () => {
        cache.processEvent({
            type: 'OrderRedeemed',
            orderId: 2,
            buyer: CAROL,
            amount: 500_000n,
            price: 100_000n,
            cost: 50_000n,
        });
        expect(cache.getOrder(2)).toMatchObject({ status: 'PartiallyFilled', remainingAmount: 1_500_000n });

        cache.processEvent({
            type: 'OrderRedeemed',
            orderId: 2,
            buyer: CAROL,
            amount: 1_500_000n,
            price: 100_000n,
            cost: 150_000n,
        });
        expect(cache.getOrder(2)).toMatchObject({ status: 'Filled', remainingAmount: 0n, initialAmount: 2_000_000n });

        cache.processEvent({ type: 'OrderRemoved', orderId: 1, returnedAmount: 1_000_000n });
        expect(cache.getOrder(1)).toMatchObject({ status: 'Removed', remainingAmount: 0n });

        expect(cache.orderCount).toBe(3);
        expect(cache.activeOrderCount).toBe(1);
    });

    it('ignores events for unknown orders and unrelated events', () => {
        cache.processEvent({
            type: 'OrderRedeemed',
            orderId: 42,
            buyer: CAROL,
            amount: 1n,
            price: 1n,
            cost: 1n,
        });
        cache.processEvent({ type: 'UserRegistered', user: CAROL, sponsor: ALICE });

        expect(cache.getOrder(42)).toBeUndefined();
        expect(cache.orderCount).toBe(3);
    });

    it('sorts cheapest first, larger orders first on ties', () => {
        expect(cache.getActiveOrdersSorted().map((order) => order.orderId)).toEqual([3, 2, 1]);
        expect(cache.getOrdersByOwner(ALICE).map((order) => order.orderId)).toEqual([1, 3]);
    });

    it('quotes a budget across the book', () => {
        const quote = cache.quoteBudget(800_000n);

        expect(quote.totalAmount).toBe(7_500_000n);
        expect(quote.totalCost).toBe(800_000n);
        expect(quote.legs).toEqual([
            { orderId: 3, amount: 5_000_000n, cost: 500_000n, pricePerToken: 100_000n },
            { orderId: 2, amount: 2_000_000n, cost: 200_000n, pricePerToken: 100_000n },
            { orderId: 1, amount: 500_000n, cost: 100_000n, pricePerToken: 200_000n },
        ]);
    });

    it('returns copies', () => {
        const order = cache.getOrder(3);
        if (order) order.remainingAmount = 0n;
        expect(cache.getOrder(3)?.remainingAmount).toBe(5_000_000n);
    });

    it('replays and follows a live engine', () => {
        const { engine } = createMarket();
        engine.startSaleRound(at(CAROL, 0));
        engine.buySaleTokens(at(ALICE, 1), 1_000_000_000n);
        engine.startTradeRound(at(CAROL, 2));
        engine.addOrder(at(ALICE, 3), 10_000_000_000n, 100_000n);

        const live = new OrderCache(SCALE);
        live.attach(engine);
        expect(live.getOrder(1)).toMatchObject({ status: 'Open', remainingAmount: 10_000_000_000n });

        engine.redeemOrder(at(DAVE, 4), 1, 500_000_000n);
        expect(live.getOrder(1)?.remainingAmount).toBe(engine.getOrder(1)?.remainingAmount);

        live.detach();
        engine.removeOrder(at(ALICE, 5), 1);
        expect(live.getOrder(1)?.status).toBe('PartiallyFilled');
    });
});
