import type { AddressRange } from "@port-hunter/shared";

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Convert a dotted-decimal IPv4 address to its unsigned 32-bit value.
 * Returns null for anything that is not a valid address.
 */
export function ipToInt(address: string): number | null {
  const match = IPV4_PATTERN.exec(address.trim());
  if (!match) {
    return null;
  }

  let value = 0;
  for (const part of match.slice(1)) {
    const octet = parseInt(part, 10);
    if (octet > 255) {
      return null;
    }
    value = value * 256 + octet;
  }
  return value;
}

export function isValidIpv4(address: string): boolean {
  return ipToInt(address) !== null;
}

/**
 * Check whether an address lies inside an inclusive range
 */
export function isInRange(address: string, range: AddressRange): boolean {
  const value = ipToInt(address);
  const start = ipToInt(range.start);
  const end = ipToInt(range.end);

  if (value === null || start === null || end === null) {
    return false;
  }

  return start <= value && value <= end;
}

/**
 * Find the first configured range containing the address
 */
export function findMatchingRange(
  address: string,
  ranges: readonly AddressRange[]
): AddressRange | null {
  return ranges.find((range) => isInRange(address, range)) ?? null;
}

export function formatRange(range: AddressRange): string {
  return `${range.start}-${range.end}`;
}
