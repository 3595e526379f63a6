import { createHash } from 'blake3';

const textEncoder = new TextEncoder();

export const hexToBytes = (hex: string): Uint8Array => {
  const clean = hex.length % 2 === 0 ? hex : `0${hex}`;
  const result = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    result[i / 2] = parseInt(clean.slice(i, i + 2), 16);
  }
  return result;
};

/**
 * Seed for one variation in one session. Depends only on the encounter content,
 * the variation id and the session seed, never on the order variations resolve in.
 */
export const deriveVariationSeed = (
  encounterHash: string,
  variationId: string,
  sessionSeed: number,
): number => {
  const hasher = createHash();
  hasher.update(hexToBytes(encounterHash));
  hasher.update(textEncoder.encode(variationId));
  const seedBytes = new Uint8Array(4);
  new DataView(seedBytes.buffer).setUint32(0, sessionSeed >>> 0, true);
  hasher.update(seedBytes);
  const digest = hasher.digest();
  return new DataView(digest.buffer, digest.byteOffset, digest.byteLength).getUint32(0, true);
};

export const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const sampleUniform = <T>(values: readonly T[], seed: number): T => {
  if (values.length === 0) {
    throw new RangeError('Cannot sample from an empty domain');
  }
  const index = Math.min(values.length - 1, Math.floor(mulberry32(seed)() * values.length));
  return values[index];
};
