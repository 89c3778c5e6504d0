import { describe, it, expect, beforeEach } from 'vitest';
import { GuardViolation, StateNotFound, ValidationError } from '../errors.js';
import { ALICE, BOB, CAROL, ENGINE, ROUND, SINK, at, createMarket } from './fixtures.js';

describe('order book', () => {
    let market: ReturnType<typeof createMarket>;

    // Alice holds the whole first sale (1e11 raw tokens) and trading is open.
    beforeEach(() => {
        market = createMarket();
        market.engine.startSaleRound(at(CAROL, 0));
        market.engine.buySaleTokens(at(ALICE, 1), 1_000_000_000n);
        market.engine.startTradeRound(at(CAROL, 2));
    });

    describe('addOrder', () => {
        it('escrows the tokens in engine custody', () => {
            const { engine, ledger } = market;

            const added = engine.addOrder(at(ALICE, 3), 10_000_000_000n, 100_000n);

            expect(added).toEqual({
                type: 'OrderAdded',
                orderId: 1,
                owner: ALICE,
                amount: 10_000_000_000n,
                price: 100_000n,
            });
            expect(ledger.balanceOf(ALICE)).toBe(90_000_000_000n);
            expect(ledger.balanceOf(ENGINE)).toBe(10_000_000_000n);
            expect(engine.getOrder(1)).toEqual({
                id: 1,
                owner: ALICE,
                pricePerToken: 100_000n,
                remainingAmount: 10_000_000_000n,
            });
            expect(engine.nextOrderId()).toBe(2);
        });

        it('never reuses an order id', () => {
            const { engine } = market;
            engine.addOrder(at(ALICE, 3), 1_000n, 100_000n);
            engine.removeOrder(at(ALICE, 4), 1);

            expect(engine.addOrder(at(ALICE, 5), 1_000n, 100_000n).orderId).toBe(2);
            expect(engine.orders().map((order) => order.id)).toEqual([2]);
        });

        it('validates price and amount', () => {
            const { engine } = market;
            expect(() => engine.addOrder(at(ALICE, 3), 1_000n, 0n)).toThrow('Not valid price');
            expect(() => engine.addOrder(at(ALICE, 3), 0n, 100_000n)).toThrow('Not enough tokens');
            expect(() => engine.addOrder(at(ALICE, 3), 200_000_000_000n, 100_000n)).toThrow('Not enough tokens');
            expect(() => engine.addOrder(at(BOB, 3), 1n, 100_000n)).toThrow(ValidationError);
        });

        it('is closed outside an active trade round', () => {
            expect(() => market.engine.addOrder(at(ALICE, 2 + ROUND), 1_000n, 100_000n)).toThrow(GuardViolation);
        });
    });

    describe('removeOrder', () => {
        beforeEach(() => {
            market.engine.addOrder(at(ALICE, 3), 10_000_000_000n, 100_000n);
        });

        it('returns the remaining tokens to the owner', () => {
            const { engine, ledger } = market;

            const removed = engine.removeOrder(at(ALICE, 4), 1);

            expect(removed).toEqual({ type: 'OrderRemoved', orderId: 1, returnedAmount: 10_000_000_000n });
            expect(ledger.balanceOf(ALICE)).toBe(100_000_000_000n);
            expect(engine.getOrder(1)).toBeNull();
            expect(() => engine.removeOrder(at(ALICE, 5), 1)).toThrow(StateNotFound);
            expect(() => engine.redeemOrder(at(BOB, 5), 1, 1_000_000n)).toThrow("Order doesn't exist or filled");
        });

        it('rejects unknown ids and other owners', () => {
            const { engine } = market;
            expect(() => engine.removeOrder(at(ALICE, 4), 99)).toThrow(StateNotFound);
            expect(() => engine.removeOrder(at(BOB, 4), 1)).toThrow(ValidationError);
            expect(() => engine.removeOrder(at(BOB, 4), 1)).toThrow('Not valid order id');
            expect(engine.getOrder(1)?.remainingAmount).toBe(10_000_000_000n);
        });

        it('works after the trade round has ended', () => {
            const removed = market.engine.removeOrder(at(ALICE, 2 + 5 * ROUND), 1);
            expect(removed.returnedAmount).toBe(10_000_000_000n);
        });
    });

    describe('redeemOrder', () => {
        beforeEach(() => {
            market.engine.addOrder(at(ALICE, 3), 10_000_000_000n, 100_000n);
        });

        it('fills an order across partial redemptions', () => {
            const { engine, ledger, gateway } = market;

            const first = engine.redeemOrder(at(BOB, 4), 1, 300_000_000n);
            const second = engine.redeemOrder(at(CAROL, 5), 1, 1_000_000_000n);

            expect(first.amount).toBe(3_000_000_000n);
            expect(first.cost).toBe(300_000_000n);
            expect(second.amount).toBe(7_000_000_000n);
            expect(second.cost).toBe(700_000_000n);
            expect(first.amount + second.amount).toBe(10_000_000_000n);

            expect(engine.getOrder(1)?.remainingAmount).toBe(0n);
            expect(ledger.balanceOf(BOB)).toBe(3_000_000_000n);
            expect(ledger.balanceOf(CAROL)).toBe(7_000_000_000n);
            expect(ledger.balanceOf(ENGINE)).toBe(0n);

            expect(gateway.receivedBy(ALICE)).toBe(950_000_000n);
            expect(gateway.receivedBy(CAROL)).toBe(300_000_000n);
            expect(gateway.receivedBy(SINK)).toBe(130_000_000n);
            expect(engine.round(5).accumulatedTradeVolume).toBe(1_000_000_000n);

            expect(() => engine.redeemOrder(at(BOB, 6), 1, 1_000_000n)).toThrow("Order doesn't exist or filled");
            expect(engine.removeOrder(at(ALICE, 7), 1).returnedAmount).toBe(0n);
        });

        it('rejects payments that buy nothing', () => {
            const { engine } = market;
            engine.addOrder(at(ALICE, 3), 1n, 100_000n);

            expect(() => engine.redeemOrder(at(BOB, 4), 1, 0n)).toThrow('Not enough ether to buy a token');
            expect(() => engine.redeemOrder(at(BOB, 4), 2, 100_000_000n)).toThrow('Not enough ether to buy a token');
            expect(engine.getOrder(2)?.remainingAmount).toBe(1n);
        });

        it('is closed once the trade round expires', () => {
            expect(() => market.engine.redeemOrder(at(BOB, 2 + ROUND), 1, 1_000_000n)).toThrow('InappropriateRound');
        });
    });
});
