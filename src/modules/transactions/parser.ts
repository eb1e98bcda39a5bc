import { ParseResult } from "./transaction";

export const FIELD_DELIMITER = ",";
const FIELD_COUNT = 4;

// Plain decimal only: no sign, exponent, currency symbol or grouping.
const AMOUNT_PATTERN = /^(\d+(\.\d+)?|\.\d+)$/;

/**
 * Decodes one `date,account,merchant,amount` line.
 *
 * Never throws. Lines that cannot be decoded come back as `{ ok: false }`
 * so the caller can skip them and move on.
 */
export function parseTransactionLine(line: string): ParseResult {
  const fields = line.split(FIELD_DELIMITER).map((field) => field.trim());
  if (fields.length !== FIELD_COUNT) {
    return { ok: false, reason: "FIELD_COUNT" };
  }

  const [date, accountIdentifier, merchantIdentifier, rawAmount] = fields;
  if (!AMOUNT_PATTERN.test(rawAmount)) {
    return { ok: false, reason: "INVALID_AMOUNT" };
  }

  const amount = Number(rawAmount);
  if (!Number.isFinite(amount)) {
    return { ok: false, reason: "INVALID_AMOUNT" };
  }

  return {
    ok: true,
    record: { date, accountIdentifier, merchantIdentifier, amount }
  };
}
