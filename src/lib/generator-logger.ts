/**
 * Structured log of generator decisions
 */

import type { ClientId, TransactionId } from "./ledger-events";

export type GeneratorLogEntry =
  | { type: "CLIENT_INTRODUCED"; step: number; client: ClientId; timestamp: string }
  | { type: "DISPUTE_OPENED"; step: number; client: ClientId; tx: TransactionId; timestamp: string }
  | { type: "DISPUTE_RESOLVED"; step: number; client: ClientId; tx: TransactionId; timestamp: string }
  | { type: "DISPUTE_CHARGED_BACK"; step: number; client: ClientId; tx: TransactionId; timestamp: string }
  | { type: "RUN_COMPLETED"; step: number; steps: number; events: number; openDisputes: number; timestamp: string };

export class GeneratorLogger {
  private logs: GeneratorLogEntry[] = [];

  logClientIntroduced(step: number, client: ClientId): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "CLIENT_INTRODUCED", step, client, timestamp });
  }

  logDisputeOpened(step: number, client: ClientId, tx: TransactionId): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "DISPUTE_OPENED", step, client, tx, timestamp });
  }

  logDisputeResolved(step: number, client: ClientId, tx: TransactionId): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "DISPUTE_RESOLVED", step, client, tx, timestamp });
  }

  logChargeback(step: number, client: ClientId, tx: TransactionId): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "DISPUTE_CHARGED_BACK", step, client, tx, timestamp });
  }

  /**
   * `step` is the id the next step would take
   */
  logRunCompleted(step: number, steps: number, events: number, openDisputes: number): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "RUN_COMPLETED", step, steps, events, openDisputes, timestamp });
  }

  getLogs(): readonly GeneratorLogEntry[] {
    return this.logs;
  }

  exportJson(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  clear(): void {
    this.logs = [];
  }
}
