import { parseTransactionLine } from "../src/modules/transactions/parser";

describe("parseTransactionLine", () => {
  test("decodes a well-formed line", () => {
    expect(parseTransactionLine("2024-01-01,1234567890123456,GAS123,50.00")).toEqual({
      ok: true,
      record: {
        date: "2024-01-01",
        accountIdentifier: "1234567890123456",
        merchantIdentifier: "GAS123",
        amount: 50
      }
    });
  });

  test("accepts the date as-is without validating it", () => {
    const result = parseTransactionLine("yesterday,1234567890123456,GAS123,1.5");
    expect(result.ok && result.record.date).toBe("yesterday");
  });

  test("drops a trailing carriage return", () => {
    const result = parseTransactionLine("2024-01-01,1234567890123456,GAS123,12.75\r");
    expect(result.ok && result.record.amount).toBe(12.75);
  });

  test("accepts a leading-dot decimal", () => {
    const result = parseTransactionLine("2024-01-01,1234567890123456,GAS123,.5");
    expect(result.ok && result.record.amount).toBe(0.5);
  });

  test("three fields is malformed", () => {
    expect(parseTransactionLine("2024-01-01,1234567890123456,GAS123")).toEqual({
      ok: false,
      reason: "FIELD_COUNT"
    });
  });

  test("two fields is malformed", () => {
    expect(parseTransactionLine("2024-01-01,1234567890123456")).toEqual({
      ok: false,
      reason: "FIELD_COUNT"
    });
  });

  test("an empty line is malformed", () => {
    expect(parseTransactionLine("")).toEqual({ ok: false, reason: "FIELD_COUNT" });
  });

  test("an extra field is malformed", () => {
    expect(parseTransactionLine("2024-01-01,1234567890123456,GAS123,1,000.00")).toEqual({
      ok: false,
      reason: "FIELD_COUNT"
    });
  });

  test.each(["abc", "-5.00", "1e3", "$10.00", "", "10.", "NaN", "Infinity"])(
    "amount %p is malformed",
    (amount) => {
      expect(parseTransactionLine(`2024-01-01,1234567890123456,GAS123,${amount}`)).toEqual({
        ok: false,
        reason: "INVALID_AMOUNT"
      });
    }
  );
});
