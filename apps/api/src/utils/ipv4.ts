const OCTET = /^(0|[1-9]\d{0,2})$/;

export const MAX_IPV4 = 0xffffffff;

/**
 * Parse a dotted-quad IPv4 address into its 32-bit value
 */
export function parseIPv4(text: string): number | null {
  const parts = text.trim().split(".");
  if (parts.length !== 4) {
    return null;
  }

  let value = 0;
  for (const part of parts) {
    if (!OCTET.test(part)) {
      return null;
    }
    const octet = parseInt(part, 10);
    if (octet > 255) {
      return null;
    }
    // Multiplication keeps the result unsigned, unlike <<
    value = value * 256 + octet;
  }

  return value;
}

export function formatIPv4(value: number): string {
  return [
    Math.floor(value / 0x1000000) % 256,
    Math.floor(value / 0x10000) % 256,
    Math.floor(value / 0x100) % 256,
    value % 256,
  ].join(".");
}

export interface IPv4Block {
  network: number;
  broadcast: number;
  prefix: number;
}

/**
 * Parse a CIDR block. Host bits in the address are masked off,
 * so 192.168.1.6/30 yields the 192.168.1.4/30 block.
 */
export function parseIPv4Cidr(text: string): IPv4Block | null {
  const [address, prefixText, ...rest] = text.trim().split("/");
  if (address === undefined || prefixText === undefined || rest.length > 0) {
    return null;
  }
  if (!/^\d{1,2}$/.test(prefixText)) {
    return null;
  }

  const prefix = parseInt(prefixText, 10);
  const base = parseIPv4(address);
  if (prefix > 32 || base === null) {
    return null;
  }

  const size = 2 ** (32 - prefix);
  const network = base - (base % size);
  return { network, broadcast: network + size - 1, prefix };
}
