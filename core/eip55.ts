/**
 * EIP-55 Mixed-Case Checksum
 */

import { utf8ToBytes } from '@noble/hashes/utils.js';
import { keccak256 } from './crypto';

const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;

/**
 * - `valid`: casing equals the checksum casing
 * - `unchecksummed`: uniformly lower- or upper-case (or digits only), carries no checksum
 * - `invalid`: mixed case that disagrees with the checksum, or not an address
 */
export type Eip55State = 'valid' | 'invalid' | 'unchecksummed';

export function isEvmAddressShape(value: string): boolean {
  return EVM_ADDRESS.test(value);
}

/**
 * Apply EIP-55 casing to a "0x"-prefixed 20-byte hex address
 * @throws Error when the input is not 0x followed by 40 hex digits
 */
export function toChecksumAddress(address: string): string {
  if (!isEvmAddressShape(address)) {
    throw new Error(`Invalid EVM address: ${address}`);
  }
  const body = address.slice(2).toLowerCase();
  const hash = keccak256(utf8ToBytes(body));

  let result = '0x';
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    const byte = hash[i >> 1];
    const nibble = i % 2 === 0 ? byte >> 4 : byte & 0x0f;
    result += nibble >= 8 ? char.toUpperCase() : char;
  }
  return result;
}

export function eip55State(address: string): Eip55State {
  if (!isEvmAddressShape(address)) return 'invalid';
  const body = address.slice(2);
  // Uniform casing carries no checksum, even where it coincides with one
  if (body === body.toLowerCase() || body === body.toUpperCase()) return 'unchecksummed';
  return toChecksumAddress(address).slice(2) === body ? 'valid' : 'invalid';
}

/**
 * True only when the address carries a correct checksum
 */
export function isValidEip55(address: string): boolean {
  return eip55State(address) === 'valid';
}
