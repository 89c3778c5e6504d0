import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import { ValidationError } from './errors.js';

/** The null address: never a valid participant, sponsor or recipient. */
export const NULL_ADDRESS = normalizeSuiAddress('0x0');

/**
 * Normalize a Sui address (lowercase, 0x-prefixed, 32 bytes).
 * Throws ValidationError for anything that is not a Sui address.
 */
export function toAddress(value: string, message = 'Not valid address'): string {
    const normalized = normalizeSuiAddress(value.trim());
    if (!isValidSuiAddress(normalized)) {
        throw new ValidationError(message);
    }
    return normalized;
}

export function isNullAddress(address: string): boolean {
    return address === NULL_ADDRESS;
}

/** Short form for log lines: 0x1234…abcd */
export function shortAddress(address: string): string {
    return `${address.slice(0, 6)}…${address.slice(-4)}`;
}
