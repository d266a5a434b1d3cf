import { lookup } from 'node:dns/promises';
import { BlockList, isIP } from 'node:net';

/** Resolves a hostname to every address it points at. */
export type HostResolver = (hostname: string) => Promise<string[]>;

const NON_PUBLIC = new BlockList();
NON_PUBLIC.addSubnet('0.0.0.0', 8, 'ipv4');
NON_PUBLIC.addSubnet('10.0.0.0', 8, 'ipv4');
NON_PUBLIC.addSubnet('100.64.0.0', 10, 'ipv4');
NON_PUBLIC.addSubnet('127.0.0.0', 8, 'ipv4');
NON_PUBLIC.addSubnet('169.254.0.0', 16, 'ipv4');
NON_PUBLIC.addSubnet('172.16.0.0', 12, 'ipv4');
NON_PUBLIC.addSubnet('192.0.0.0', 24, 'ipv4');
NON_PUBLIC.addSubnet('192.168.0.0', 16, 'ipv4');
NON_PUBLIC.addSubnet('198.18.0.0', 15, 'ipv4');
NON_PUBLIC.addSubnet('224.0.0.0', 3, 'ipv4');
NON_PUBLIC.addAddress('::', 'ipv6');
NON_PUBLIC.addAddress('::1', 'ipv6');
NON_PUBLIC.addSubnet('fc00::', 7, 'ipv6');
NON_PUBLIC.addSubnet('fe80::', 10, 'ipv6');
NON_PUBLIC.addSubnet('ff00::', 8, 'ipv6');

export const resolveHost: HostResolver = async (hostname) => {
	const addresses = await lookup(hostname, { all: true, verbatim: true });
	return addresses.map((entry) => entry.address);
};

// IPv4-mapped IPv6, in dotted (::ffff:127.0.0.1) or hex (::ffff:7f00:1) form.
function ipv4FromMapped(address: string): string | undefined {
	const dotted = address.match(/^::ffff:(\d+\.\d+\.\d+\.\d+)$/i);
	if (dotted) return dotted[1];
	const hex = address.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i);
	if (!hex) return undefined;
	const high = parseInt(hex[1], 16);
	const low = parseInt(hex[2], 16);
	return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

/** Loopback, private, link-local, shared, multicast and reserved addresses. */
export function isNonPublicAddress(address: string): boolean {
	const mapped = ipv4FromMapped(address);
	if (mapped) return NON_PUBLIC.check(mapped, 'ipv4');

	const family = isIP(address);
	if (family === 4) return NON_PUBLIC.check(address, 'ipv4');
	if (family === 6) return NON_PUBLIC.check(address, 'ipv6');
	return true;
}

/**
 * Addresses `url` would connect to. IP literals are returned as they are; names go
 * through `resolver`.
 */
export async function addressesOf(url: URL, resolver: HostResolver): Promise<string[]> {
	const hostname = url.hostname.replace(/^\[(.*)\]$/, '$1');
	return isIP(hostname) ? [hostname] : resolver(hostname);
}
