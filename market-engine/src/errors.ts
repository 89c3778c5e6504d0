/**
 * Every abort carries a `kind` so callers can tell guard failures from
 * validation failures, missing state and failed transfers.
 */

export type MarketErrorKind =
    | 'GuardViolation'
    | 'ValidationError'
    | 'StateNotFound'
    | 'TransferFailure';

export type GuardReason = 'InappropriateRound' | 'Unauthorized' | 'Reentrancy';

export class MarketError extends Error {
    readonly kind: MarketErrorKind;

    constructor(kind: MarketErrorKind, message: string) {
        super(message);
        this.name = kind;
        this.kind = kind;
    }
}

/** Wrong round phase, missing privilege, or a nested call. */
export class GuardViolation extends MarketError {
    readonly reason: GuardReason;

    constructor(reason: GuardReason, message: string = reason) {
        super('GuardViolation', message);
        this.reason = reason;
    }
}

/** Zero or invalid amounts, prices or addresses; insufficient balance. */
export class ValidationError extends MarketError {
    constructor(message: string) {
        super('ValidationError', message);
    }
}

/** Unknown or already-filled order id. */
export class StateNotFound extends MarketError {
    constructor(message: string) {
        super('StateNotFound', message);
    }
}

/** The payment gateway rejected a send. */
export class TransferFailure extends MarketError {
    readonly recipient: string;
    readonly amount: bigint;

    constructor(recipient: string, amount: bigint) {
        super('TransferFailure', `Transfer of ${amount} to ${recipient} failed`);
        this.recipient = recipient;
        this.amount = amount;
    }
}

export function isMarketError(value: unknown): value is MarketError {
    return value instanceof MarketError;
}

export const ensureError = (value: unknown): Error => {
    if (value instanceof Error) return value;

    let stringified: string;
    try {
        stringified = JSON.stringify(value);
    } catch {
        stringified = String(value);
    }

    return new Error(`This value was thrown as is, not through an Error: ${stringified}`);
};
