export const MAX_AMOUNT = (1n << 64n) - 1n;

/**
 * Build the accepted amount pattern for a token with `decimals` places:
 * optional leading "+", normal notation, optional decimal point, at most
 * `decimals` fractional digits and at least one digit overall.
 */
export function amountPattern(decimals: number): RegExp {
  return new RegExp(`^\\+?(?=\\.?\\d)\\d*\\.?\\d{0,${decimals}}$`);
}

/**
 * Parse a human-readable amount into base units (amount * 10^decimals).
 * Returns undefined when the text does not match amountPattern(decimals).
 *
 * e.g., parseAmount('1.5', 6) -> 1500000n
 */
export function parseAmount(text: string, decimals: number): bigint | undefined {
  if (!amountPattern(decimals).test(text)) {
    return undefined;
  }

  const unsigned = text.startsWith('+') ? text.slice(1) : text;
  const [whole, fraction = ''] = unsigned.split('.');
  const digits = (whole || '0') + fraction.padEnd(decimals, '0');
  return BigInt(digits);
}

/**
 * Render base units as a decimal string with trailing zeros trimmed.
 *
 * e.g., formatAmount(1500000n, 6) -> "1.5"
 */
export function formatAmount(baseUnits: bigint, decimals: number): string {
  if (decimals === 0) {
    return baseUnits.toString();
  }
  const str = baseUnits.toString().padStart(decimals + 1, '0');
  const intPart = str.slice(0, -decimals);
  const decPart = str.slice(-decimals).replace(/0+$/, '');
  return decPart ? `${intPart}.${decPart}` : intPart;
}
