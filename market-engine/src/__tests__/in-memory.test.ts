import { describe, it, expect, vi } from 'vitest';
import { InMemoryPaymentGateway, InMemoryTokenLedger } from '../in-memory.js';
import { ALICE, BOB, ENGINE } from './fixtures.js';

describe('InMemoryTokenLedger', () => {
    it('mints, moves and burns', () => {
        const ledger = new InMemoryTokenLedger({ operator: ENGINE });
        ledger.mint(ENGINE, 1_000n);
        ledger.transfer(ALICE, 400n);
        ledger.transferFrom(ALICE, BOB, 150n);
        ledger.burn(ENGINE, 600n);

        expect(ledger.balanceOf(ENGINE)).toBe(0n);
        expect(ledger.balanceOf(ALICE)).toBe(250n);
        expect(ledger.balanceOf('0xB0B')).toBe(150n);
        expect(ledger.totalSupply).toBe(400n);
        expect(ledger.decimals()).toBe(6);
    });

    it('refuses to overdraw', () => {
        const ledger = new InMemoryTokenLedger({ operator: ENGINE, decimals: 9 });
        expect(() => ledger.transferFrom(ALICE, BOB, 1n)).toThrow(RangeError);
        expect(ledger.decimals()).toBe(9);
    });

    it('restores a checkpoint', () => {
        const ledger = new InMemoryTokenLedger({ operator: ENGINE });
        ledger.mint(ALICE, 10n);
        const token = ledger.checkpoint();
        ledger.mint(ALICE, 5n);

        ledger.restore(token);

        expect(ledger.balanceOf(ALICE)).toBe(10n);
        expect(ledger.totalSupply).toBe(10n);
        expect(() => ledger.restore({ nope: true })).toThrow('[Ledger] Unknown checkpoint');
    });
});

describe('InMemoryPaymentGateway', () => {
    it('credits recipients and runs their hooks', () => {
        const gateway = new InMemoryPaymentGateway();
        const hook = vi.fn();
        gateway.onReceive(ALICE, hook);

        expect(gateway.send(ALICE, 5n)).toBe(true);
        expect(gateway.receivedBy(ALICE)).toBe(5n);
        expect(gateway.sendCount).toBe(1);
        expect(hook).toHaveBeenCalledWith(5n);
    });

    it('fails sends to rejecting or reverting recipients', () => {
        const gateway = new InMemoryPaymentGateway();
        gateway.reject(BOB);
        gateway.onReceive(ALICE, () => {
            throw new Error('revert');
        });

        expect(gateway.send(BOB, 1n)).toBe(false);
        expect(gateway.send(ALICE, 1n)).toBe(false);
        expect(gateway.receivedBy(ALICE)).toBe(0n);
        expect(gateway.sendCount).toBe(0);

        gateway.accept(BOB);
        expect(gateway.send(BOB, 1n)).toBe(true);
    });
});
