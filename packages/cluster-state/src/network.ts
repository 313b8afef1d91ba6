import { BlockList, isIPv4 } from 'node:net';

export interface Subnet {
  network: string;
  prefix:  number;
  contains(ip: string): boolean;
}

const CIDR = /^(\d{1,3}(?:\.\d{1,3}){3})\/(\d{1,2})$/;

/** Parse an IPv4 CIDR such as 10.0.0.0/24. Returns null when malformed. */
export function parseCidr(cidr: string): Subnet | null {
  const match = CIDR.exec(cidr.trim());
  if (!match) return null;

  const [, network, prefixRaw] = match;
  const prefix = Number(prefixRaw);
  if (!isIPv4(network) || prefix > 32) return null;

  const range = new BlockList();
  range.addSubnet(network, prefix, 'ipv4');

  return {
    network,
    prefix,
    contains: (ip) => isIPv4(ip) && range.check(ip, 'ipv4'),
  };
}

export { isIPv4 };

const DNS_LABEL = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

export function isDnsLabel(value: string): boolean {
  return DNS_LABEL.test(value);
}
