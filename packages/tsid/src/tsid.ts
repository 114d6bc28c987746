/**
 * TSID (Time-Sorted ID) Generator
 *
 * A TSID is a 64-bit value made of 42 bits of milliseconds since a custom
 * epoch and 22 bits of randomness, encoded as 13 Crockford Base32 characters
 * (e.g., "0HZXEQ5Y8JY5Z").
 *
 * IDs generated by one process sort lexicographically in creation order,
 * which the read views rely on for stable insertion ordering.
 */

import crypto from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const CROCKFORD_DECODE = new Map<string, number>();

for (const [index, char] of [...CROCKFORD_ALPHABET].entries()) {
	CROCKFORD_DECODE.set(char, index);
	CROCKFORD_DECODE.set(char.toLowerCase(), index);
}
// Crockford substitutions
for (const [char, value] of [
	['I', 1],
	['i', 1],
	['L', 1],
	['l', 1],
	['O', 0],
	['o', 0],
] as const) {
	CROCKFORD_DECODE.set(char, value);
}

// 2020-01-01T00:00:00Z
const TSID_EPOCH = 1577836800000n;

const RANDOM_BITS = 22n;
const RANDOM_MASK = (1n << RANDOM_BITS) - 1n;
const TSID_LENGTH = 13;

let lastTimestamp = 0n;
let counter = 0n;

function randomBits(): bigint {
	const bytes = crypto.randomBytes(3);
	return BigInt(bytes.readUIntBE(0, 3)) & RANDOM_MASK;
}

function currentTimestamp(): bigint {
	return BigInt(Date.now()) - TSID_EPOCH;
}

/**
 * Next TSID value. Within one millisecond the random part is incremented so
 * that IDs from this process stay strictly increasing.
 */
function nextValue(): bigint {
	let timestamp = currentTimestamp();

	if (timestamp <= lastTimestamp) {
		counter = (counter + 1n) & RANDOM_MASK;
		if (counter === 0n) {
			// counter overflow: spin until the clock moves on
			while (timestamp <= lastTimestamp) {
				timestamp = currentTimestamp();
			}
			lastTimestamp = timestamp;
			counter = randomBits();
		}
	} else {
		lastTimestamp = timestamp;
		counter = randomBits();
	}

	return (lastTimestamp << RANDOM_BITS) | counter;
}

function encode(value: bigint): string {
	let remaining = value;
	let out = '';
	for (let i = 0; i < TSID_LENGTH; i++) {
		out = CROCKFORD_ALPHABET.charAt(Number(remaining & 31n)) + out;
		remaining >>= 5n;
	}
	return out;
}

function decode(str: string): bigint {
	if (str.length !== TSID_LENGTH) {
		throw new Error(`Invalid TSID length: expected ${TSID_LENGTH}, got ${str.length}`);
	}

	let value = 0n;
	for (const char of str) {
		const digit = CROCKFORD_DECODE.get(char);
		if (digit === undefined) {
			throw new Error(`Invalid Crockford Base32 character: ${char}`);
		}
		value = (value << 5n) | BigInt(digit);
	}
	return value;
}

/**
 * Generate a new TSID as a Crockford Base32 string.
 */
export function generate(): string {
	return encode(nextValue());
}

/**
 * Check whether a string is a well-formed TSID.
 */
export function isValid(str: string): boolean {
	if (str.length !== TSID_LENGTH) {
		return false;
	}
	for (const char of str) {
		if (!CROCKFORD_DECODE.has(char)) {
			return false;
		}
	}
	return true;
}

/**
 * Creation time encoded in a TSID.
 */
export function getTimestamp(str: string): Date {
	return new Date(Number((decode(str) >> RANDOM_BITS) + TSID_EPOCH));
}
