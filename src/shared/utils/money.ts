import { MONEY } from "../../config/constants/listing.constants.js";

const MONEY_RE = new RegExp(
  `^(\\d{1,${MONEY.MAX_INTEGER_DIGITS}})(?:\\.(\\d{1,${MONEY.FRACTION_DIGITS}}))?$`
);

/**
 * Parses a non-negative decimal amount ("50", "50.5", "50.50") into integer cents.
 * Returns null for anything that does not fit numeric(10, 2).
 */
export function parseMoney(input: string): number | null {
  const m = MONEY_RE.exec(input.trim());
  if (!m) return null;

  const whole = Number(m[1]);
  const fraction = Number((m[2] ?? "").padEnd(MONEY.FRACTION_DIGITS, "0"));
  return whole * 100 + fraction;
}

/** numeric columns come back from pg as strings */
export function centsFromNumeric(value: string): number {
  const cents = parseMoney(value);
  if (cents === null) throw new Error(`Unexpected money value from database: ${value}`);
  return cents;
}

export function formatMoney(cents: number): string {
  const whole = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(MONEY.FRACTION_DIGITS, "0");
  return `${whole}.${fraction}`;
}
