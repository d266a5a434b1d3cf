import { describe, it, expect, vi } from 'vitest';
import { addressesOf, isNonPublicAddress, type HostResolver } from './hostGuard';

describe('isNonPublicAddress', () => {
	it.each(['127.0.0.1', '10.20.30.40', '172.31.255.1', '192.168.1.1', '169.254.169.254', '100.64.0.1', '0.0.0.0'])(
		'blocks the IPv4 address %s',
		(address) => {
			expect(isNonPublicAddress(address)).toBe(true);
		}
	);

	it.each(['::1', '::', 'fd12:3456::1', 'fe80::1', '::ffff:127.0.0.1', '::ffff:7f00:1'])(
		'blocks the IPv6 address %s',
		(address) => {
			expect(isNonPublicAddress(address)).toBe(true);
		}
	);

	it('allows public addresses', () => {
		expect(isNonPublicAddress('93.184.215.14')).toBe(false);
		expect(isNonPublicAddress('2606:4700:4700::1111')).toBe(false);
		expect(isNonPublicAddress('::ffff:93.184.215.14')).toBe(false);
	});

	it('treats anything that is not an IP address as non-public', () => {
		expect(isNonPublicAddress('localhost')).toBe(true);
	});
});

describe('addressesOf', () => {
	it('does not resolve IP literals', async () => {
		const resolver = vi.fn<HostResolver>();

		expect(await addressesOf(new URL('http://[::1]:3000/'), resolver)).toEqual(['::1']);
		expect(await addressesOf(new URL('http://127.0.0.1/'), resolver)).toEqual(['127.0.0.1']);
		expect(resolver).not.toHaveBeenCalled();
	});

	it('resolves host names', async () => {
		const resolver = vi.fn<HostResolver>().mockResolvedValue(['93.184.215.14']);

		expect(await addressesOf(new URL('https://example.com/paper.pdf'), resolver)).toEqual(['93.184.215.14']);
		expect(resolver).toHaveBeenCalledWith('example.com');
	});
});
