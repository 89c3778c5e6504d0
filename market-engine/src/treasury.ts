import { TransferFailure, ValidationError } from './errors.js';
import type { MarketState } from './state.js';
import type { PaymentGateway } from './types.js';

/**
 * Native funds held by the engine. Incoming payments are credited by the
 * entry points; every outgoing send goes through `send` and is checked.
 */
export class Treasury {
    constructor(
        private readonly state: MarketState,
        private readonly gateway: PaymentGateway,
    ) {}

    get balance(): bigint {
        return this.state.treasury;
    }

    receive(amount: bigint): void {
        if (amount < 0n) throw new ValidationError('Not valid payment');
        this.state.treasury += amount;
    }

    /** Send `amount` to `to`. A zero amount is a no-op. */
    send(to: string, amount: bigint): void {
        if (amount === 0n) return;
        if (amount < 0n || amount > this.state.treasury) {
            throw new ValidationError('Insufficient funds amount to transfer');
        }

        // Debit first: the recipient may run code during the send.
        this.state.treasury -= amount;
        if (!this.gateway.send(to, amount)) {
            throw new TransferFailure(to, amount);
        }
    }
}
