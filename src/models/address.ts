/**
 * Bluetooth address and UUID representations.
 *
 * BGAPI carries both least significant byte first; the text forms here are
 * the usual most-significant-first notation.
 */

import { BD_ADDR_SIZE } from '../protocol/constants';
import { bytesToHex } from '../protocol/bytes';

/**
 * Format a wire address as `aa:bb:cc:dd:ee:ff`.
 *
 * @param address - 6 bytes, least significant first
 * @throws {RangeError} If the address is not 6 bytes long
 */
export function formatAddress(address: Uint8Array): string {
  if (address.length !== BD_ADDR_SIZE) {
    throw new RangeError(
      `Address must be ${BD_ADDR_SIZE} bytes, got ${address.length}`
    );
  }
  return Array.from(address, (b) => b.toString(16).padStart(2, '0'))
    .reverse()
    .join(':');
}

/**
 * Parse `aa:bb:cc:dd:ee:ff` (or `-` separated) into wire order.
 *
 * @throws {RangeError} If the text is not six hex octets
 */
export function parseAddress(text: string): Uint8Array {
  const octets = text.trim().split(/[:-]/);
  if (
    octets.length !== BD_ADDR_SIZE ||
    !octets.every((octet) => /^[0-9a-fA-F]{2}$/.test(octet))
  ) {
    throw new RangeError(`Invalid Bluetooth address: ${text}`);
  }
  return Uint8Array.from(octets.reverse(), (octet) => parseInt(octet, 16));
}

/**
 * Format a wire UUID.
 *
 * 16-bit UUIDs become 4 hex digits, 128-bit ones the dashed 8-4-4-4-12 form,
 * anything else plain hex.
 */
export function formatUuid(uuid: Uint8Array): string {
  const hex = bytesToHex(uuid.slice().reverse());
  if (uuid.length !== 16) {
    return hex;
  }
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}
