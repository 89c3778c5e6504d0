/**
 * Reference implementations of the token ledger and payment gateway.
 * Both support checkpoint/restore so the engine can roll a whole call back.
 */

import { normalizeSuiAddress } from '@mysten/sui/utils';
import type { Checkpointable, PaymentGateway, TokenLedger } from './types.js';

// ============================================================
// Token ledger
// ============================================================

interface LedgerCheckpoint {
    balances: Map<string, bigint>;
    totalSupply: bigint;
}

export class InMemoryTokenLedger implements TokenLedger, Checkpointable {
    private balances: Map<string, bigint> = new Map();
    private supply = 0n;
    private readonly tokenDecimals: number;
    private readonly operator: string;

    /**
     * @param config.operator - Account whose tokens `transfer` moves (the engine custody)
     */
    constructor(config: { operator: string; decimals?: number }) {
        this.operator = normalizeSuiAddress(config.operator);
        this.tokenDecimals = config.decimals ?? 6;
    }

    decimals(): number {
        return this.tokenDecimals;
    }

    get totalSupply(): bigint {
        return this.supply;
    }

    balanceOf(address: string): bigint {
        return this.balances.get(normalizeSuiAddress(address)) ?? 0n;
    }

    mint(to: string, amount: bigint): void {
        this.credit(to, amount);
        this.supply += amount;
    }

    burn(from: string, amount: bigint): void {
        this.debit(from, amount);
        this.supply -= amount;
    }

    transfer(to: string, amount: bigint): void {
        this.move(this.operator, to, amount);
    }

    transferFrom(from: string, to: string, amount: bigint): void {
        this.move(from, to, amount);
    }

    checkpoint(): LedgerCheckpoint {
        return { balances: new Map(this.balances), totalSupply: this.supply };
    }

    restore(token: unknown): void {
        if (!isLedgerCheckpoint(token)) {
            throw new TypeError('[Ledger] Unknown checkpoint');
        }
        this.balances = new Map(token.balances);
        this.supply = token.totalSupply;
    }

    private move(from: string, to: string, amount: bigint): void {
        this.debit(from, amount);
        this.credit(to, amount);
    }

    private credit(address: string, amount: bigint): void {
        if (amount < 0n) throw new RangeError(`[Ledger] Negative amount ${amount}`);
        const key = normalizeSuiAddress(address);
        this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    }

    private debit(address: string, amount: bigint): void {
        if (amount < 0n) throw new RangeError(`[Ledger] Negative amount ${amount}`);
        const key = normalizeSuiAddress(address);
        const balance = this.balances.get(key) ?? 0n;
        if (balance < amount) {
            throw new RangeError(`[Ledger] Insufficient balance: ${key} has ${balance}, needs ${amount}`);
        }
        this.balances.set(key, balance - amount);
    }
}

function isLedgerCheckpoint(value: unknown): value is LedgerCheckpoint {
    return (
        typeof value === 'object' &&
        value !== null &&
        'balances' in value &&
        value.balances instanceof Map &&
        'totalSupply' in value &&
        typeof value.totalSupply === 'bigint'
    );
}

// ============================================================
// Payment gateway
// ============================================================

/** Code that runs at the recipient while a payment is delivered. */
export type RecipientHook = (amount: bigint) => void;

interface GatewayCheckpoint {
    received: Map<string, bigint>;
    sends: number;
}

export class InMemoryPaymentGateway implements PaymentGateway, Checkpointable {
    private received: Map<string, bigint> = new Map();
    private hooks: Map<string, RecipientHook> = new Map();
    private rejecting: Set<string> = new Set();
    private sends = 0;

    send(to: string, amount: bigint): boolean {
        const key = normalizeSuiAddress(to);
        if (this.rejecting.has(key)) return false;

        this.received.set(key, (this.received.get(key) ?? 0n) + amount);
        this.sends++;

        const hook = this.hooks.get(key);
        if (hook) {
            try {
                hook(amount);
            } catch {
                // The recipient reverted: the send fails as a whole.
                this.received.set(key, (this.received.get(key) ?? 0n) - amount);
                this.sends--;
                return false;
            }
        }
        return true;
    }

    /** Total MIST delivered to `address`. */
    receivedBy(address: string): bigint {
        return this.received.get(normalizeSuiAddress(address)) ?? 0n;
    }

    get sendCount(): number {
        return this.sends;
    }

    onReceive(address: string, hook: RecipientHook): void {
        this.hooks.set(normalizeSuiAddress(address), hook);
    }

    reject(address: string): void {
        this.rejecting.add(normalizeSuiAddress(address));
    }

    accept(address: string): void {
        this.rejecting.delete(normalizeSuiAddress(address));
    }

    checkpoint(): GatewayCheckpoint {
        return { received: new Map(this.received), sends: this.sends };
    }

    restore(token: unknown): void {
        if (!isGatewayCheckpoint(token)) {
            throw new TypeError('[Gateway] Unknown checkpoint');
        }
        this.received = new Map(token.received);
        this.sends = token.sends;
    }
}

function isGatewayCheckpoint(value: unknown): value is GatewayCheckpoint {
    return (
        typeof value === 'object' &&
        value !== null &&
        'received' in value &&
        value.received instanceof Map &&
        'sends' in value &&
        typeof value.sends === 'number'
    );
}
