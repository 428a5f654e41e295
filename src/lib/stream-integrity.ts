/**
 * Stream Integrity Checks
 *
 * Replays a ledger event stream and reports every place where it breaks the
 * generator's guarantees:
 * - tx-sequence: base transaction ids are 0, 1, 2, ... in order
 * - dispute-reference: a dispute names a base transaction already emitted
 * - double-dispute: a transaction is disputed while its dispute is still open
 * - orphan-close: a resolve/chargeback names a transaction with no open dispute
 * - client-bound: the client pool grows by at most one id per base transaction
 *   (client 0 is always allowed)
 * - amount-range: amount outside [amountMin, amountMax) or with too many decimals
 *
 * Works on parsed CSV as well as on generator output, so it doubles as a
 * sanity check for externally produced fixtures.
 */

import { Decimal } from "decimal.js";
import { DEFAULT_GENERATOR_CONFIG } from "./generator-config";
import type { GeneratorConfig } from "./generator-config";
import type { LedgerEvent, TransactionId } from "./ledger-events";

export type IntegrityRule =
  | "tx-sequence"
  | "dispute-reference"
  | "double-dispute"
  | "orphan-close"
  | "client-bound"
  | "amount-range";

export interface IntegrityViolation {
  /** Position of the offending event in the stream */
  index: number;
  rule: IntegrityRule;
  message: string;
}

export interface IntegrityReport {
  ok: boolean;
  violations: IntegrityViolation[];
}

export type AmountBounds = Pick<GeneratorConfig, "amountMin" | "amountMax" | "amountDecimals">;

export function verifyStream(
  events: readonly LedgerEvent[],
  bounds: AmountBounds = DEFAULT_GENERATOR_CONFIG
): IntegrityReport {
  const violations: IntegrityViolation[] = [];
  const emitted = new Set<TransactionId>();
  const open = new Set<TransactionId>();
  const amountMin = new Decimal(bounds.amountMin);
  const amountMax = new Decimal(bounds.amountMax);
  let expectedTx = 0;
  let highestClient = 0;

  events.forEach((event, index) => {
    const report = (rule: IntegrityRule, message: string) => {
      violations.push({ index, rule, message });
    };

    switch (event.type) {
      case "deposit":
      case "withdrawal": {
        if (event.tx !== expectedTx) {
          report("tx-sequence", `expected tx ${expectedTx}, got ${event.tx}`);
        }
        expectedTx = Math.max(expectedTx, event.tx) + 1;
        emitted.add(event.tx);

        if (event.client > highestClient + 1) {
          report("client-bound", `client ${event.client} skips ahead of highest client ${highestClient}`);
        }
        highestClient = Math.max(highestClient, event.client);

        if (event.amount.lt(amountMin) || event.amount.gte(amountMax)) {
          report(
            "amount-range",
            `amount ${event.amount.toFixed()} outside [${bounds.amountMin}, ${bounds.amountMax})`
          );
        } else if (event.amount.decimalPlaces() > bounds.amountDecimals) {
          report(
            "amount-range",
            `amount ${event.amount.toFixed()} has more than ${bounds.amountDecimals} decimals`
          );
        }
        break;
      }

      case "dispute":
        if (event.client > highestClient) {
          report("client-bound", `client ${event.client} has not been introduced`);
        }
        if (!emitted.has(event.tx)) {
          report("dispute-reference", `dispute of unknown tx ${event.tx}`);
        } else if (open.has(event.tx)) {
          report("double-dispute", `tx ${event.tx} is already under dispute`);
        }
        open.add(event.tx);
        break;

      case "resolve":
      case "chargeback":
        if (event.client > highestClient) {
          report("client-bound", `client ${event.client} has not been introduced`);
        }
        if (!open.delete(event.tx)) {
          report("orphan-close", `${event.type} of tx ${event.tx} without an open dispute`);
        }
        break;
    }
  });

  return { ok: violations.length === 0, violations };
}
