import { describe, it, expect } from 'vitest';
import {
    bpsShare,
    costFor,
    formatPrice,
    fromRaw,
    nextPrice,
    priceAt,
    toRaw,
    tokenScaleFor,
    tokensFor,
} from '../math.js';

const SCALE = 1_000_000n;

describe('tokensFor / costFor', () => {
    it('converts native amounts at the seed price', () => {
        expect(tokensFor(700_000_000n, 10_000n, SCALE)).toBe(70_000_000_000n);
        expect(costFor(70_000_000_000n, 10_000n, SCALE)).toBe(700_000_000n);
    });

    it('truncates toward zero', () => {
        expect(tokensFor(500_000_000n, 14_300n, SCALE)).toBe(34_965_034_965n);
        expect(costFor(34_965_034_965n, 14_300n, SCALE)).toBe(499_999_999n);
        expect(costFor(1n, 10_000n, SCALE)).toBe(0n);
    });

    it('rejects a non-positive price', () => {
        expect(() => tokensFor(1n, 0n, SCALE)).toThrow(RangeError);
    });
});

describe('price escalation', () => {
    it('grows by 3% plus the increment', () => {
        expect(nextPrice(10_000n, 4_000n)).toBe(14_300n);
        expect(nextPrice(14_300n, 4_000n)).toBe(18_729n);
    });

    it('walks the sequence from the seed', () => {
        expect(priceAt(1, 10_000n, 4_000n)).toBe(10_000n);
        expect(priceAt(3, 10_000n, 4_000n)).toBe(18_729n);
        expect(() => priceAt(0, 10_000n, 4_000n)).toThrow(RangeError);
    });
});

describe('helpers', () => {
    it('takes basis-point shares with truncation', () => {
        expect(bpsShare(1_000_001n, 500)).toBe(50_000n);
        expect(bpsShare(700_000_000n, 300)).toBe(21_000_000n);
        expect(bpsShare(123n, 0)).toBe(0n);
    });

    it('scales decimals', () => {
        expect(tokenScaleFor(6)).toBe(1_000_000n);
        expect(() => tokenScaleFor(-1)).toThrow(RangeError);
        expect(toRaw(1.5, 9)).toBe(1_500_000_000n);
        expect(fromRaw(2_500_000n, 6)).toBe(2.5);
    });

    it('formats MIST prices as SUI', () => {
        expect(formatPrice(14_300n)).toBe('0.0000143');
        expect(formatPrice(1_000_000_000n)).toBe('1');
        expect(formatPrice(1_500_000_000n)).toBe('1.5');
    });
});
