/**
 * Ledger Event Stream Generator
 *
 * Produces a stream of deposits and withdrawals with a dispute lifecycle
 * layered on top. Every dispute names the base transaction of its own step,
 * and every resolve/chargeback names a transaction taken out of the open
 * dispute pool, so a processor reading the stream never sees a reference to
 * an unknown or already-closed dispute.
 *
 * Per step (step index = transaction id):
 *   1. deposit or withdrawal, 50/50
 *   2. new client (cursor + 1) or a uniformly chosen existing id in [0, maxClientId]
 *   3. amount on the decimal grid of [amountMin, amountMax)
 *   4. base transaction
 *   5. maybe dispute it
 *   6. maybe resolve one open dispute
 *   7. maybe charge back one open dispute
 *
 * Resolves and chargebacks carry the acting client of the current step, not
 * the client that opened the dispute.
 *
 * At step 0 nothing has been introduced yet but maxClientId is already 0, so
 * the reuse branch yields client 0. Downstream fixtures rely on this.
 */

import { Decimal } from "decimal.js";
import { DisputePool } from "./dispute-pool";
import type { GeneratorLogger } from "./generator-logger";
import { resolveGeneratorConfig } from "./generator-config";
import type { GeneratorConfig } from "./generator-config";
import { BASE_TRANSACTION_TYPES } from "./ledger-events";
import type { ClientId, LedgerEvent, TransactionId, TransactionRecord } from "./ledger-events";
import { createRandomSource } from "./rng";
import type { RandomSource } from "./rng";

export interface StreamGeneratorOptions {
  /** Overrides the source derived from config.seed */
  rng?: RandomSource;
  /** Records generator decisions; no log is kept without one */
  logger?: GeneratorLogger;
}

export interface GeneratorState {
  clientCursor: ClientId;
  maxClientId: ClientId;
  nextTxId: TransactionId;
  openDisputes: TransactionId[];
}

export class StreamGenerator {
  private readonly config: GeneratorConfig;
  private readonly rng: RandomSource;
  private readonly logger?: GeneratorLogger;
  private readonly disputePool = new DisputePool();

  // Amounts are drawn as integer units of 10^-amountDecimals
  private readonly unitScale: Decimal;
  private readonly minUnits: number;
  private readonly unitSpan: number;

  private clientCursor: ClientId = 0;
  private maxClientId: ClientId = 0;
  private nextTxId: TransactionId = 0;

  constructor(config: Partial<GeneratorConfig> = {}, options: StreamGeneratorOptions = {}) {
    this.config = resolveGeneratorConfig(config);
    this.rng = options.rng ?? createRandomSource(this.config.seed);
    this.logger = options.logger;

    this.unitScale = new Decimal(10).pow(this.config.amountDecimals);
    const minUnits = new Decimal(this.config.amountMin).times(this.unitScale).ceil();
    const maxUnits = new Decimal(this.config.amountMax).times(this.unitScale).ceil();
    this.minUnits = minUnits.toNumber();
    this.unitSpan = maxUnits.minus(minUnits).toNumber();
  }

  /**
   * Run `count` steps and collect the emitted events
   */
  generate(count: number): LedgerEvent[] {
    return Array.from(this.stream(count));
  }

  /**
   * Run `count` steps lazily, yielding events as each step emits them.
   * State advances as the iterator is consumed.
   */
  *stream(count: number): Generator<LedgerEvent> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`);
    }

    let emitted = 0;
    for (let i = 0; i < count; i++) {
      for (const event of this.step()) {
        emitted++;
        yield event;
      }
    }

    this.logger?.logRunCompleted(this.nextTxId, count, emitted, this.disputePool.size);
  }

  private step(): LedgerEvent[] {
    const tx = this.nextTxId++;
    const events: LedgerEvent[] = [];

    const type = this.rng.randomChoice(BASE_TRANSACTION_TYPES);
    const client = this.selectClient(tx);
    const base: TransactionRecord = { type, client, tx, amount: this.drawAmount() };
    events.push(base);

    if (this.rng.chance(this.config.disputeProbability)) {
      this.disputePool.add(tx);
      events.push({ type: "dispute", client, tx });
      this.logger?.logDisputeOpened(tx, client, tx);
    }

    if (!this.disputePool.isEmpty() && this.rng.chance(this.config.resolveProbability)) {
      const disputed = this.disputePool.take(this.rng);
      events.push({ type: "resolve", client, tx: disputed });
      this.logger?.logDisputeResolved(tx, client, disputed);
    }

    if (!this.disputePool.isEmpty() && this.rng.chance(this.config.chargebackProbability)) {
      const disputed = this.disputePool.take(this.rng);
      events.push({ type: "chargeback", client, tx: disputed });
      this.logger?.logChargeback(tx, client, disputed);
    }

    return events;
  }

  private selectClient(step: number): ClientId {
    if (this.rng.chance(this.config.newClientProbability)) {
      this.clientCursor++;
      this.maxClientId = Math.max(this.maxClientId, this.clientCursor);
      this.logger?.logClientIntroduced(step, this.clientCursor);
      return this.clientCursor;
    }
    return this.rng.randomRange(0, this.maxClientId);
  }

  private drawAmount(): Decimal {
    const units = this.minUnits + this.rng.randomInt(this.unitSpan);
    return new Decimal(units).div(this.unitScale);
  }

  getState(): GeneratorState {
    return {
      clientCursor: this.clientCursor,
      maxClientId: this.maxClientId,
      nextTxId: this.nextTxId,
      openDisputes: this.disputePool.toArray(),
    };
  }

  getConfig(): Readonly<GeneratorConfig> {
    return this.config;
  }

  getLogger(): GeneratorLogger | undefined {
    return this.logger;
  }
}

/**
 * One-shot helper: fresh generator, `count` steps
 */
export function generateLedgerStream(count: number, config: Partial<GeneratorConfig> = {}): LedgerEvent[] {
  return new StreamGenerator(config).generate(count);
}
