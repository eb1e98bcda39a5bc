export type TransactionRecord = {
  date: string;
  accountIdentifier: string;
  merchantIdentifier: string;
  amount: number;
};

export type MalformedReason = "FIELD_COUNT" | "INVALID_AMOUNT";

export type ParseResult =
  | { ok: true; record: TransactionRecord }
  | { ok: false; reason: MalformedReason };
