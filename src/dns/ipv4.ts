import { DnsCodecError } from './errors.js';

export type Ipv4Octets = [number, number, number, number];

function invalid(address: string): DnsCodecError {
  return new DnsCodecError('INVALID_ADDRESS', `Invalid IPv4 address: ${address}`);
}

export function parseIpv4(address: string): Ipv4Octets {
  const out: Ipv4Octets = [0, 0, 0, 0];
  let octet = 0;
  let value = 0;
  let digits = 0;

  for (let i = 0; i <= address.length; i += 1) {
    const c = i === address.length ? 0x2e /* '.' */ : address.charCodeAt(i);
    if (c === 0x2e /* '.' */) {
      if (digits === 0 || octet >= 4) throw invalid(address);
      out[octet] = value;
      octet += 1;
      value = 0;
      digits = 0;
      continue;
    }

    if (c < 0x30 /* '0' */ || c > 0x39 /* '9' */) throw invalid(address);
    // Canonical decimal only, so that formatIpv4(parseIpv4(a)) === a.
    if (digits > 0 && value === 0) throw invalid(address);
    digits += 1;
    value = value * 10 + (c - 0x30);
    if (value > 255) throw invalid(address);
  }

  if (octet !== 4) throw invalid(address);
  return out;
}

export function formatIpv4(value: number): string {
  return `${(value >>> 24) & 0xff}.${(value >>> 16) & 0xff}.${(value >>> 8) & 0xff}.${value & 0xff}`;
}
