/**
 * Statement amounts arrive as a number, a numeric string, an empty string or
 * null depending on the ledger row. Decoding never throws: a malformed field
 * degrades to absent so the rest of the statement page survives.
 */

export type OptionalAmount =
  | { present: true; value: number }
  | { present: false };

export const ABSENT: OptionalAmount = Object.freeze({ present: false });

export function present(value: number): OptionalAmount {
  return { present: true, value };
}

export function decodeTolerantNumber(value: unknown): OptionalAmount {
  if (value === null || value === undefined || value === "") return ABSENT;

  if (typeof value === "number") {
    return Number.isFinite(value) ? present(value) : ABSENT;
  }

  if (typeof value === "string") {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return ABSENT;
    }
    return typeof parsed === "number" && Number.isFinite(parsed)
      ? present(parsed)
      : ABSENT;
  }

  return ABSENT;
}

export function amountOrUndefined(amount: OptionalAmount): number | undefined {
  return amount.present ? amount.value : undefined;
}
