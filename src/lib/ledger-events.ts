/**
 * Ledger Event Records and CSV Line Format
 *
 * The five event kinds a transaction-processing engine consumes, as one
 * discriminated union tagged by `type`, plus the line format shared by the
 * CLI writer and the CSV reader:
 *
 *   type,client,tx,amount
 *   deposit,<client>,<tx>,<amount>
 *   withdrawal,<client>,<tx>,<amount>
 *   dispute,<client>,<tx>
 *   resolve,<client>,<tx>
 *   chargeback,<client>,<tx>
 *
 * Column count varies by row type, so readers dispatch on the first field.
 */

import { Decimal } from "decimal.js";

// ============================================================================
// Event Types
// ============================================================================

export type ClientId = number;
export type TransactionId = number;

export type BaseTransactionType = "deposit" | "withdrawal";
export type DisputeLifecycleType = "dispute" | "resolve" | "chargeback";
export type LedgerEventType = BaseTransactionType | DisputeLifecycleType;

export const BASE_TRANSACTION_TYPES: readonly BaseTransactionType[] = ["deposit", "withdrawal"];

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
];

/**
 * Deposit or withdrawal - the only records that carry an amount
 */
export interface TransactionRecord {
  type: BaseTransactionType;
  /** Acting client */
  client: ClientId;
  /** Step index that produced this record */
  tx: TransactionId;
  /** Amount with at most 4 decimal places */
  amount: Decimal;
}

export interface DisputeEvent {
  type: "dispute";
  client: ClientId;
  tx: TransactionId;
}

export interface ResolveEvent {
  type: "resolve";
  client: ClientId;
  tx: TransactionId;
}

export interface ChargebackEvent {
  type: "chargeback";
  client: ClientId;
  tx: TransactionId;
}

export type DisputeLifecycleEvent = DisputeEvent | ResolveEvent | ChargebackEvent;

export type LedgerEvent = TransactionRecord | DisputeLifecycleEvent;

export function isBaseTransaction(event: LedgerEvent): event is TransactionRecord {
  return event.type === "deposit" || event.type === "withdrawal";
}

export function isLedgerEventType(value: string): value is LedgerEventType {
  return LEDGER_EVENT_TYPES.some(type => type === value);
}

// ============================================================================
// Formatting
// ============================================================================

export const CSV_HEADER = "type,client,tx,amount";

/**
 * Render an amount without exponent notation or trailing zeros
 */
export function formatAmount(amount: Decimal): string {
  return amount.toFixed();
}

export function formatEventLine(event: LedgerEvent): string {
  switch (event.type) {
    case "deposit":
    case "withdrawal":
      return `${event.type},${event.client},${event.tx},${formatAmount(event.amount)}`;
    case "dispute":
    case "resolve":
    case "chargeback":
      return `${event.type},${event.client},${event.tx}`;
  }
}

/**
 * Header line followed by one line per event
 */
export function* toCsvLines(events: Iterable<LedgerEvent>): Generator<string> {
  yield CSV_HEADER;
  for (const event of events) {
    yield formatEventLine(event);
  }
}

export function formatEventCsv(events: Iterable<LedgerEvent>): string {
  return Array.from(toCsvLines(events)).join("\n");
}

// ============================================================================
// Parsing
// ============================================================================

export class EventParseError extends Error {
  readonly lineNumber?: number;

  constructor(message: string, lineNumber?: number) {
    super(lineNumber === undefined ? message : `line ${lineNumber}: ${message}`);
    this.name = "EventParseError";
    this.lineNumber = lineNumber;
  }
}

function parseId(field: string | undefined, column: string): number {
  if (field === undefined || !/^\d+$/.test(field)) {
    throw new EventParseError(`${column} must be a non-negative integer, got "${field ?? ""}"`);
  }
  const id = Number(field);
  if (!Number.isSafeInteger(id)) {
    throw new EventParseError(`${column} exceeds the safe integer range, got "${field}"`);
  }
  return id;
}

function parseAmount(field: string): Decimal {
  let amount: Decimal;
  try {
    amount = new Decimal(field);
  } catch {
    throw new EventParseError(`amount is not a number: "${field}"`);
  }
  if (!amount.isFinite() || amount.isNegative()) {
    throw new EventParseError(`amount must be a non-negative number, got "${field}"`);
  }
  return amount;
}

/**
 * Parse one data line. Fields are trimmed; an empty trailing amount column
 * counts as absent.
 */
export function parseEventLine(line: string): LedgerEvent {
  const fields = line.split(",").map(field => field.trim());
  const [type, clientField, txField, amountField] = fields;

  if (fields.length > 4) {
    throw new EventParseError(`expected at most 4 columns, got ${fields.length}`);
  }
  if (!isLedgerEventType(type)) {
    throw new EventParseError(`unknown event type "${type}"`);
  }

  const client = parseId(clientField, "client");
  const tx = parseId(txField, "tx");
  const amount = amountField === undefined || amountField === "" ? undefined : amountField;

  switch (type) {
    case "deposit":
    case "withdrawal":
      if (amount === undefined) {
        throw new EventParseError(`${type} requires an amount`);
      }
      return { type, client, tx, amount: parseAmount(amount) };
    case "dispute":
    case "resolve":
    case "chargeback":
      if (amount !== undefined) {
        throw new EventParseError(`${type} must not carry an amount`);
      }
      return { type, client, tx };
  }
}

/**
 * Parse a whole document. The header line is optional; blank lines are skipped.
 */
export function parseEventCsv(text: string): LedgerEvent[] {
  const events: LedgerEvent[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === "") return;
    if (index === 0 && line.replace(/\s/g, "") === CSV_HEADER) return;

    try {
      events.push(parseEventLine(line));
    } catch (error) {
      if (error instanceof EventParseError) {
        throw new EventParseError(error.message, index + 1);
      }
      throw error;
    }
  });

  return events;
}
