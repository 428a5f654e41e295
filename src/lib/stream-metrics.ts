/**
 * Stream Metrics
 *
 * Aggregate counts and totals over a ledger event stream, for the CLI's
 * verbose summary and for eyeballing generated fixtures.
 */

import { Decimal } from "decimal.js";
import { LEDGER_EVENT_TYPES } from "./ledger-events";
import type { ClientId, LedgerEvent, LedgerEventType, TransactionId } from "./ledger-events";

export interface StreamSummary {
  totalEvents: number;
  countsByType: Record<LedgerEventType, number>;
  baseTransactions: number;
  distinctClients: number;
  /** -1 for an empty stream */
  maxClientId: ClientId;
  /** Disputed and not resolved or charged back by the end of the stream */
  openDisputes: number;
  totalDeposited: Decimal;
  totalWithdrawn: Decimal;
}

export function summarizeStream(events: readonly LedgerEvent[]): StreamSummary {
  const countsByType: Record<LedgerEventType, number> = {
    deposit: 0,
    withdrawal: 0,
    dispute: 0,
    resolve: 0,
    chargeback: 0,
  };
  const clients = new Set<ClientId>();
  const open = new Set<TransactionId>();
  let maxClientId = -1;
  let totalDeposited = new Decimal(0);
  let totalWithdrawn = new Decimal(0);

  for (const event of events) {
    countsByType[event.type]++;
    clients.add(event.client);
    maxClientId = Math.max(maxClientId, event.client);

    switch (event.type) {
      case "deposit":
        totalDeposited = totalDeposited.plus(event.amount);
        break;
      case "withdrawal":
        totalWithdrawn = totalWithdrawn.plus(event.amount);
        break;
      case "dispute":
        open.add(event.tx);
        break;
      case "resolve":
      case "chargeback":
        open.delete(event.tx);
        break;
    }
  }

  return {
    totalEvents: events.length,
    countsByType,
    baseTransactions: countsByType.deposit + countsByType.withdrawal,
    distinctClients: clients.size,
    maxClientId,
    openDisputes: open.size,
    totalDeposited,
    totalWithdrawn,
  };
}

/**
 * Render a summary as `key: value` lines
 */
export function formatSummary(summary: StreamSummary): string {
  const lines = [
    `events: ${summary.totalEvents}`,
    ...LEDGER_EVENT_TYPES.map(type => `${type}: ${summary.countsByType[type]}`),
    `clients: ${summary.distinctClients}`,
    `max client: ${summary.maxClientId}`,
    `open disputes: ${summary.openDisputes}`,
    `deposited: ${summary.totalDeposited.toFixed()}`,
    `withdrawn: ${summary.totalWithdrawn.toFixed()}`,
  ];
  return lines.join("\n");
}
