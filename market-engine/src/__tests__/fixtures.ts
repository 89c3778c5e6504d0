import { normalizeSuiAddress } from '@mysten/sui/utils';
import { vi } from 'vitest';
import { InMemoryPaymentGateway, InMemoryTokenLedger } from '../in-memory.js';
import { MarketEngine } from '../market-engine.js';
import type { CallContext, MarketConfig, MarketLogger } from '../types.js';

export const ENGINE = normalizeSuiAddress('0xe1');
export const ADMIN = normalizeSuiAddress('0xad');
export const SINK = normalizeSuiAddress('0x51');
export const ALICE = normalizeSuiAddress('0xa11ce');
export const BOB = normalizeSuiAddress('0xb0b');
export const CAROL = normalizeSuiAddress('0xca201');
export const DAVE = normalizeSuiAddress('0xda7e');

export const ROUND = 3 * 24 * 60 * 60;

export const at = (caller: string, now: number): CallContext => ({ caller, now });

export function silentLogger(): MarketLogger {
    return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createMarket(overrides: Partial<MarketConfig> = {}) {
    const ledger = new InMemoryTokenLedger({ operator: ENGINE });
    const gateway = new InMemoryPaymentGateway();
    const logger = silentLogger();
    const engine = new MarketEngine(
        { engineAddress: ENGINE, admin: ADMIN, fallbackSink: SINK, logger, ...overrides },
        { ledger, gateway },
    );
    return { engine, ledger, gateway, logger };
}
