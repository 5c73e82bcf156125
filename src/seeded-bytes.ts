import * as crypto from 'node:crypto';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[-+]?\d+$/;

export const nowInNanoseconds = () =>
    BigInt(Date.now()) * 1_000_000n + process.hrtime.bigint() % 1_000_000n;

/**
 * Parses a seed as a signed 64-bit integer. A missing seed is taken from the clock, anything
 * that isn't an integer is 0, and out-of-range values are clamped to the int64 range.
 */
export function parseSeed(seedParam: string | null): bigint {
    if (seedParam === null || seedParam === '') return nowInNanoseconds();
    if (!INTEGER_PATTERN.test(seedParam)) return 0n;

    const seed = BigInt(seedParam);
    if (seed > INT64_MAX) return INT64_MAX;
    if (seed < INT64_MIN) return INT64_MIN;
    return seed;
}

/**
 * Yields exactly `length` pseudo-random bytes, at most `chunkSize` at a time. The bytes are an
 * AES-256-CTR keystream keyed by the seed, so a given seed always produces the same output.
 */
export function* generateSeededBytes(
    seed: bigint,
    length: number,
    chunkSize: number
): Generator<Buffer, void, undefined> {
    const key = crypto.createHash('sha256').update(seed.toString()).digest();
    const cipher = crypto.createCipheriv('aes-256-ctr', key, Buffer.alloc(16));

    const maxChunk = Math.max(1, Math.min(chunkSize, length));
    const zeros = Buffer.alloc(maxChunk);

    let remaining = length;
    while (remaining > 0) {
        const size = Math.min(maxChunk, remaining);
        yield cipher.update(zeros.subarray(0, size));
        remaining -= size;
    }
}
