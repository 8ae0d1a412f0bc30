import bs58 from 'bs58';
import {
  ADDRESS_BYTE_LENGTH,
  ADDRESS_MAX_LENGTH,
  ADDRESS_MIN_LENGTH,
  NON_TARGET_MINTS,
  WSOL_MINT,
} from '../config/constants.js';

const ADDRESS_CHARS = new RegExp(`^[1-9A-HJ-NP-Za-km-z]{${ADDRESS_MIN_LENGTH},${ADDRESS_MAX_LENGTH}}$`);

/** Base58 string of the right length that decodes to a 32-byte public key. */
export function isCanonicalAddress(value: string): boolean {
  if (!ADDRESS_CHARS.test(value)) return false;
  try {
    return bs58.decode(value).length === ADDRESS_BYTE_LENGTH;
  } catch {
    return false;
  }
}

export function isNativeWrapper(value: string): boolean {
  return value === WSOL_MINT || value.toUpperCase() === 'SOL';
}

/** Canonical address that is not one of the base assets we never buy. */
export function isTradeTarget(value: string): boolean {
  return isCanonicalAddress(value) && !NON_TARGET_MINTS.has(value);
}
