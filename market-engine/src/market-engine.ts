/**
 * Tidemark Market: Market Engine
 *
 * The public entry points of the two-phase market, wired together:
 *
 *   startSaleRound → mint inventory → buySaleTokens (refund + referral payouts)
 *   startTradeRound → burn unsold → addOrder / removeOrder / redeemOrder
 *   redeemOrder → realized volume → next startSaleRound's token amount
 *
 * Every entry point runs as one atomic unit: engine state and every
 * checkpointable collaborator are captured first and restored if anything
 * throws, and the events of an aborted call are never delivered. A
 * reentrancy flag spans each call, so a recipient that calls back into
 * the engine while being paid fails instead of seeing half-applied state.
 */

import { isNullAddress, shortAddress, toAddress } from './address.js';
import {
    type ResolvedMarketConfig,
    resolveMarketConfig,
    validateRates,
    validateRoundDuration,
} from './config.js';
import { GuardViolation, ValidationError, ensureError } from './errors.js';
import type {
    MarketEvent,
    MarketEventListener,
    OrderAdded,
    OrderRedeemed,
    OrderRemoved,
    SaleRoundStarted,
    SaleTokenBought,
    TradeRoundStarted,
    UserRegistered,
} from './events.js';
import { formatPrice, tokenScaleFor } from './math.js';
import { OrderBook } from './order-book.js';
import { ReferralRegistry } from './referral-registry.js';
import { RewardRouter } from './reward-router.js';
import { RoundController, initialRound, isRoundActive } from './round-controller.js';
import { type MarketState, restoreState, snapshotState } from './state.js';
import { Treasury } from './treasury.js';
import type {
    CallContext,
    Checkpointable,
    MarketConfig,
    MarketLogger,
    MarketMetrics,
    Order,
    PaymentGateway,
    ReferralRewardConfig,
    RoundPhase,
    RoundView,
    TokenLedger,
} from './types.js';

function isCheckpointable(value: object): value is Checkpointable {
    return (
        'checkpoint' in value &&
        typeof value.checkpoint === 'function' &&
        'restore' in value &&
        typeof value.restore === 'function'
    );
}

export interface MarketEngineDeps {
    ledger: TokenLedger;
    gateway: PaymentGateway;
}

export class MarketEngine {
    private readonly config: ResolvedMarketConfig;
    private readonly state: MarketState;
    private readonly logger: MarketLogger;
    private readonly checkpointables: Checkpointable[];

    private readonly treasury: Treasury;
    private readonly registry: ReferralRegistry;
    private readonly rounds: RoundController;
    private readonly book: OrderBook;

    private locked = false;
    private readonly eventLog: MarketEvent[] = [];
    private readonly listeners: Set<MarketEventListener> = new Set();
    private readonly metrics: MarketMetrics = {
        callsCommitted: 0,
        callsReverted: 0,
        saleTokensSold: 0n,
        tradeVolume: 0n,
        referralRewardsPaid: 0n,
        fallbackRewardsPaid: 0n,
    };

    constructor(config: MarketConfig, deps: MarketEngineDeps) {
        this.config = resolveMarketConfig(config);
        this.logger = this.config.logger;

        this.state = {
            round: initialRound(this.config.seedPrice, this.config.seedTradeVolume),
            orders: new Map(),
            nextOrderId: 1,
            referrals: new Map(),
            rewardConfig: structuredClone(this.config.rewardConfig),
            rootRewardPolicy: this.config.rootRewardPolicy,
            roundDurationSec: this.config.roundDurationSec,
            fallbackSink: this.config.fallbackSink,
            admin: this.config.admin,
            rootAccount: this.config.rootAccount,
            treasury: 0n,
            priceIncrement: this.config.priceIncrement,
        };
        ReferralRegistry.seedRoot(this.state);

        const tokenScale = tokenScaleFor(deps.ledger.decimals());
        const engineAddress = this.config.engineAddress;

        this.treasury = new Treasury(this.state, deps.gateway);
        this.registry = new ReferralRegistry(this.state);
        const rewards = new RewardRouter(this.treasury);

        this.rounds = new RoundController({
            state: this.state,
            ledger: deps.ledger,
            treasury: this.treasury,
            registry: this.registry,
            rewards,
            engineAddress,
            seedPrice: this.config.seedPrice,
            tokenScale,
        });

        this.book = new OrderBook({
            state: this.state,
            ledger: deps.ledger,
            treasury: this.treasury,
            registry: this.registry,
            rewards,
            rounds: this.rounds,
            engineAddress,
            tokenScale,
        });

        this.checkpointables = [];
        for (const collaborator of [deps.ledger, deps.gateway]) {
            if (isCheckpointable(collaborator)) {
                this.checkpointables.push(collaborator);
            }
        }
    }

    // --------------------------------------------------------
    // Rounds
    // --------------------------------------------------------

    startSaleRound(ctx: CallContext): SaleRoundStarted {
        const started = this.atomic('startSaleRound', ctx, (call, events) => {
            const event = this.rounds.startSaleRound(call);
            events.push(event);
            return event;
        });
        this.logger.log(
            `[Market] Sale round ${this.state.round.saleRoundNumber} started: ` +
            `price ${formatPrice(started.price)} SUI, ${started.amount} tokens, ends ${started.endTime}`,
        );
        return started;
    }

    buySaleTokens(ctx: CallContext, payment: bigint): SaleTokenBought {
        return this.atomic('buySaleTokens', ctx, (call, events) => {
            requirePayment(payment);
            const { bought, rewards } = this.rounds.buySaleTokens(call, payment);
            events.push(bought, ...rewards);
            return bought;
        });
    }

    startTradeRound(ctx: CallContext): TradeRoundStarted {
        const started = this.atomic('startTradeRound', ctx, (call, events) => {
            const event = this.rounds.startTradeRound(call);
            events.push(event);
            return event;
        });
        this.logger.log(`[Market] Trade round started: burned ${started.burned} unsold tokens, ends ${started.endTime}`);
        return started;
    }

    // --------------------------------------------------------
    // Order book
    // --------------------------------------------------------

    addOrder(ctx: CallContext, amount: bigint, price: bigint): OrderAdded {
        return this.atomic('addOrder', ctx, (call, events) => {
            const added = this.book.addOrder(call, amount, price);
            events.push(added);
            return added;
        });
    }

    removeOrder(ctx: CallContext, orderId: number): OrderRemoved {
        return this.atomic('removeOrder', ctx, (call, events) => {
            const removed = this.book.removeOrder(call, orderId);
            events.push(removed);
            return removed;
        });
    }

    redeemOrder(ctx: CallContext, orderId: number, payment: bigint): OrderRedeemed {
        return this.atomic('redeemOrder', ctx, (call, events) => {
            requirePayment(payment);
            const { redeemed, rewards } = this.book.redeemOrder(call, orderId, payment);
            events.push(redeemed, ...rewards);
            return redeemed;
        });
    }

    // --------------------------------------------------------
    // Referrals
    // --------------------------------------------------------

    register(ctx: CallContext, sponsor: string): UserRegistered {
        return this.atomic('register', ctx, (call, events) => {
            const registered = this.registry.register(
                call.caller,
                toAddress(sponsor, 'Not valid referrer address'),
            );
            events.push(registered);
            return registered;
        });
    }

    // --------------------------------------------------------
    // Admin
    // --------------------------------------------------------

    withdrawFunds(ctx: CallContext, to: string, amount: bigint): void {
        this.atomic('withdrawFunds', ctx, (call, events) => {
            this.requireAdmin(call);
            const recipient = toAddress(to, 'Not valid recipient address');
            if (isNullAddress(recipient)) {
                throw new ValidationError('Not valid recipient address');
            }
            if (amount <= 0n || amount > this.treasury.balance) {
                throw new ValidationError('Insufficient funds amount to transfer');
            }
            this.treasury.send(recipient, amount);
            events.push({ type: 'FundsWithdrawn', to: recipient, amount });
        });
    }

    updateReferralRates(ctx: CallContext, phase: RoundPhase, l1: number, l2: number): void {
        this.atomic('updateReferralRates', ctx, (call, events) => {
            this.requireAdmin(call);
            const rates = validateRates({ l1, l2 });
            if (phase === 'Sale') {
                this.state.rewardConfig.sale = rates;
            } else {
                this.state.rewardConfig.trade = rates;
            }
            events.push({ type: 'RefRewardConfigUpdated', phase, rates: { ...rates } });
        });
    }

    updateRoundDuration(ctx: CallContext, seconds: number): void {
        this.atomic('updateRoundDuration', ctx, (call, events) => {
            this.requireAdmin(call);
            this.state.roundDurationSec = validateRoundDuration(seconds);
            events.push({ type: 'RoundDurationUpdated', seconds });
        });
    }

    updateFallbackSink(ctx: CallContext, sink: string): void {
        this.atomic('updateFallbackSink', ctx, (call, events) => {
            this.requireAdmin(call);
            const address = toAddress(sink, 'Not valid fallback sink address');
            if (isNullAddress(address)) {
                throw new ValidationError('Not valid fallback sink address');
            }
            this.state.fallbackSink = address;
            events.push({ type: 'FallbackSinkUpdated', sink: address });
        });
    }

    transferAdmin(ctx: CallContext, newAdmin: string): void {
        this.atomic('transferAdmin', ctx, (call, events) => {
            this.requireAdmin(call);
            const address = toAddress(newAdmin, 'Not valid admin address');
            if (isNullAddress(address)) {
                throw new ValidationError('Not valid admin address');
            }
            this.state.admin = address;
            events.push({ type: 'AdminTransferred', previousAdmin: call.caller, newAdmin: address });
        });
    }

    // --------------------------------------------------------
    // Views
    // --------------------------------------------------------

    round(now: number): RoundView {
        const round = this.state.round;
        return { ...round, active: isRoundActive(round, round.phase, now) };
    }

    getOrder(orderId: number): Order | null {
        return this.book.getOrder(orderId);
    }

    orders(): Order[] {
        return this.book.listOrders();
    }

    nextOrderId(): number {
        return this.state.nextOrderId;
    }

    referrerOf(address: string): string | null {
        return this.registry.sponsorOf(toAddress(address));
    }

    isRegistered(address: string): boolean {
        return this.registry.isRegistered(toAddress(address));
    }

    rewardConfig(): ReferralRewardConfig {
        return structuredClone(this.state.rewardConfig);
    }

    roundDurationSec(): number {
        return this.state.roundDurationSec;
    }

    fallbackSink(): string {
        return this.state.fallbackSink;
    }

    admin(): string {
        return this.state.admin;
    }

    rootAccount(): string {
        return this.state.rootAccount;
    }

    treasuryBalance(): bigint {
        return this.treasury.balance;
    }

    events(): MarketEvent[] {
        return [...this.eventLog];
    }

    /** Listen for committed events; returns an unsubscribe function. */
    subscribe(listener: MarketEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getMetrics(): MarketMetrics {
        return { ...this.metrics };
    }

    printMetrics(): void {
        const m = this.metrics;
        this.logger.log('[Market] Metrics:');
        this.logger.log(`  Calls committed:   ${m.callsCommitted}`);
        this.logger.log(`  Calls reverted:    ${m.callsReverted}`);
        this.logger.log(`  Sale tokens sold:  ${m.saleTokensSold}`);
        this.logger.log(`  Trade volume:      ${formatPrice(m.tradeVolume)} SUI`);
        this.logger.log(`  Referral rewards:  ${formatPrice(m.referralRewardsPaid)} SUI`);
        this.logger.log(`  Fallback rewards:  ${formatPrice(m.fallbackRewardsPaid)} SUI`);
    }

    // --------------------------------------------------------
    // Call plumbing
    // --------------------------------------------------------

    private requireAdmin(call: CallContext): void {
        if (call.caller !== this.state.admin) {
            throw new GuardViolation('Unauthorized', 'Caller is not the admin');
        }
    }

    private atomic<T>(
        label: string,
        ctx: CallContext,
        body: (call: CallContext, events: MarketEvent[]) => T,
    ): T {
        if (this.locked) {
            throw new GuardViolation('Reentrancy', `Reentrant call to ${label} detected`);
        }
        this.locked = true;

        const snapshot = snapshotState(this.state);
        const checkpoints = this.checkpointables.map((c) => ({ c, token: c.checkpoint() }));
        const events: MarketEvent[] = [];
        let result: T;

        try {
            result = body(normalizeContext(ctx), events);
            this.commit(events);
        } catch (err) {
            restoreState(this.state, snapshot);
            for (const { c, token } of checkpoints) {
                c.restore(token);
            }
            this.metrics.callsReverted++;
            this.logger.warn(`[Market] ${label} by ${shortAddress(ctx.caller)} reverted: ${ensureError(err).message}`);
            throw err;
        } finally {
            this.locked = false;
        }

        this.notify(events);
        return result;
    }

    private commit(events: MarketEvent[]): void {
        this.metrics.callsCommitted++;
        for (const event of events) {
            this.eventLog.push(event);
            switch (event.type) {
                case 'SaleTokenBought':
                    this.metrics.saleTokensSold += event.amount;
                    break;
                case 'OrderRedeemed':
                    this.metrics.tradeVolume += event.cost;
                    break;
                case 'ReferralRewardPaid':
                    if (event.toFallbackSink) {
                        this.metrics.fallbackRewardsPaid += event.amount;
                    } else {
                        this.metrics.referralRewardsPaid += event.amount;
                    }
                    break;
            }
        }
    }

    private notify(events: MarketEvent[]): void {
        for (const event of events) {
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (err) {
                    this.logger.error(`[Market] Listener error on ${event.type}:`, err);
                }
            }
        }
    }
}

function normalizeContext(ctx: CallContext): CallContext {
    if (!Number.isFinite(ctx.now) || ctx.now < 0) {
        throw new ValidationError(`Not valid time: ${ctx.now}`);
    }
    return { caller: toAddress(ctx.caller, 'Not valid caller address'), now: ctx.now };
}

function requirePayment(payment: bigint): void {
    if (payment < 0n) {
        throw new ValidationError('Not valid payment');
    }
}

