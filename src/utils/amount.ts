import { UNIT_DECIMALS } from '../config/constants';

type AmountInput = string | number | bigint | null | undefined;

/** Converts a decimal string ("3.7", "0,01") to base units. */
export function parseUnits(input: string, decimals = UNIT_DECIMALS): bigint {
  const normalized = input.trim().replace(',', '.');
  if (!/^\d*\.?\d*$/.test(normalized) || normalized === '' || normalized === '.') {
    throw new Error('amount-invalid');
  }
  const [whole = '', fraction = ''] = normalized.split('.');
  if (fraction.length > decimals) {
    throw new Error('amount-too-precise');
  }
  const scale = 10n ** BigInt(decimals);
  const wholePart = BigInt(whole || '0') * scale;
  const fractionPart = fraction ? BigInt(fraction.padEnd(decimals, '0')) : 0n;
  return wholePart + fractionPart;
}

/** Formats base units as a decimal string without trailing zeroes. */
export function formatUnits(value: bigint, decimals = UNIT_DECIMALS): string {
  const negative = value < 0n;
  const absolute = negative ? -value : value;
  const scale = 10n ** BigInt(decimals);
  const whole = absolute / scale;
  const fraction = (absolute % scale).toString().padStart(decimals, '0').replace(/0+$/, '');
  const formatted = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${formatted}` : formatted;
}

/**
 * Reads an amount given in base units. Accepts bigints, safe integers and
 * digit strings; anything else is rejected with `${field}-invalid`.
 */
export function parseBaseUnits(raw: AmountInput, field: string): bigint {
  if (typeof raw === 'bigint') return raw;
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw) || raw < 0) throw new Error(`${field}-invalid`);
    return BigInt(raw);
  }
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) {
    return BigInt(raw.trim());
  }
  throw new Error(`${field}-invalid`);
}
