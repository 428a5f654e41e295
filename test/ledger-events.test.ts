import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import {
  CSV_HEADER,
  EventParseError,
  formatAmount,
  formatEventCsv,
  formatEventLine,
  parseEventCsv,
  parseEventLine,
} from "../src/lib/ledger-events";
import type { LedgerEvent } from "../src/lib/ledger-events";

describe("formatEventLine", () => {
  it("should render base transactions with an amount column", () => {
    expect(formatEventLine({ type: "deposit", client: 1, tx: 0, amount: new Decimal("123.4567") })).toBe(
      "deposit,1,0,123.4567"
    );
    expect(formatEventLine({ type: "withdrawal", client: 3, tx: 8, amount: new Decimal("150.5000") })).toBe(
      "withdrawal,3,8,150.5"
    );
  });

  it("should render dispute lifecycle events with three columns", () => {
    expect(formatEventLine({ type: "dispute", client: 2, tx: 5 })).toBe("dispute,2,5");
    expect(formatEventLine({ type: "resolve", client: 4, tx: 5 })).toBe("resolve,4,5");
    expect(formatEventLine({ type: "chargeback", client: 0, tx: 9 })).toBe("chargeback,0,9");
  });

  it("should never use exponent notation for amounts", () => {
    expect(formatAmount(new Decimal("1e-7"))).toBe("0.0000001");
    expect(formatAmount(new Decimal("1e+22"))).toBe("10000000000000000000000");
  });
});

describe("formatEventCsv", () => {
  it("should emit only the header for an empty stream", () => {
    expect(formatEventCsv([])).toBe(CSV_HEADER);
  });

  it("should emit the header followed by one line per event", () => {
    const events: LedgerEvent[] = [
      { type: "deposit", client: 1, tx: 0, amount: new Decimal(100) },
      { type: "dispute", client: 1, tx: 0 },
    ];

    expect(formatEventCsv(events)).toBe("type,client,tx,amount\ndeposit,1,0,100\ndispute,1,0");
  });
});

describe("parseEventLine", () => {
  it("should parse base transactions", () => {
    const event = parseEventLine("withdrawal, 2, 7, 101.25");

    expect(event.type).toBe("withdrawal");
    expect(event.client).toBe(2);
    expect(event.tx).toBe(7);
    if (event.type === "withdrawal") {
      expect(event.amount.toFixed()).toBe("101.25");
    }
  });

  it("should treat an empty amount column as absent", () => {
    expect(parseEventLine("resolve,1,3,")).toEqual({ type: "resolve", client: 1, tx: 3 });
  });

  it("should reject a base transaction without an amount", () => {
    expect(() => parseEventLine("deposit,1,3")).toThrow("deposit requires an amount");
  });

  it("should reject an amount on a dispute lifecycle event", () => {
    expect(() => parseEventLine("chargeback,1,3,10")).toThrow("chargeback must not carry an amount");
  });

  it("should reject unknown types, bad ids and bad amounts", () => {
    expect(() => parseEventLine("transfer,1,3,10")).toThrow('unknown event type "transfer"');
    expect(() => parseEventLine("dispute,-1,3")).toThrow(EventParseError);
    expect(() => parseEventLine("dispute,1")).toThrow('tx must be a non-negative integer, got ""');
    expect(() => parseEventLine("deposit,1,3,abc")).toThrow('amount is not a number: "abc"');
    expect(() => parseEventLine("deposit,1,3,-5")).toThrow(EventParseError);
    expect(() => parseEventLine("deposit,1,3,5,6")).toThrow("expected at most 4 columns, got 5");
  });
});

describe("parseEventLine: id range", () => {
  it("should accept the largest safe integer id", () => {
    expect(parseEventLine("dispute,1,9007199254740991")).toEqual({ type: "dispute", client: 1, tx: 9007199254740991 });
  });

  it("should reject ids that would lose precision", () => {
    expect(() => parseEventLine("dispute,1,9007199254740993")).toThrow(
      'tx exceeds the safe integer range, got "9007199254740993"'
    );
    expect(() => parseEventLine("deposit,9007199254740992,0,100")).toThrow(
      'client exceeds the safe integer range, got "9007199254740992"'
    );
  });

  it("should stop a document with an out-of-range reference at its line", () => {
    const csv = "deposit,1,9007199254740991,100\ndispute,1,9007199254740993";

    expect(() => parseEventCsv(csv)).toThrow("line 2: tx exceeds the safe integer range");
  });
});

describe("parseEventCsv", () => {
  it("should skip the header and blank lines", () => {
    const events = parseEventCsv("type,client,tx,amount\ndeposit,1,0,100\n\ndispute,1,0\n");

    expect(events.map(formatEventLine)).toEqual(["deposit,1,0,100", "dispute,1,0"]);
  });

  it("should read the generator's own output back", () => {
    const events: LedgerEvent[] = [
      { type: "deposit", client: 1, tx: 0, amount: new Decimal("199.9999") },
      { type: "withdrawal", client: 0, tx: 1, amount: new Decimal("100") },
      { type: "dispute", client: 0, tx: 1 },
      { type: "chargeback", client: 0, tx: 1 },
    ];

    const parsed = parseEventCsv(formatEventCsv(events));

    expect(parsed.map(formatEventLine)).toEqual(events.map(formatEventLine));
  });

  it("should report the line number of a malformed line", () => {
    expect(() => parseEventCsv("type,client,tx,amount\ndeposit,1,0,100\nrefund,1,0")).toThrow(
      'line 3: unknown event type "refund"'
    );
  });
});
