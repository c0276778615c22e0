import { Vector3 } from "./Vector3";

/** Uniform source in [0, 1). One instance per band; never shared across workers. */
export type Random = () => number;

// ─── Hashing ─────────────────────────────────────────────────

/**
 * Integer hash (murmurhash3 finalizer).
 * Produces well-distributed values with no visible patterns.
 */
export function hash32(v: number): number {
  v = Math.imul(v ^ (v >>> 16), 0x85ebca6b) >>> 0;
  v = Math.imul(v ^ (v >>> 13), 0xc2b2ae35) >>> 0;
  return (v ^ (v >>> 16)) >>> 0;
}

/** Derive an independent 32-bit seed for a sub-stream (band, frame, texture). */
export function deriveSeed(seed: number, stream: number): number {
  return hash32((seed >>> 0) ^ hash32(stream + 0x9e3779b9));
}

// ─── Generators ──────────────────────────────────────────────

/**
 * Counter-based generator: hashes a Weyl sequence.
 * Same seed gives the same stream.
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x9e3779b9) >>> 0;
    return hash32(state) / 4294967296;
  };
}

/** Seed from the clock and Math.random, for renders that don't ask for one. */
export function randomSeed(): number {
  return hash32(Date.now() ^ Math.floor(Math.random() * 4294967296));
}

// ─── Sampling ────────────────────────────────────────────────

export function randomRange(random: Random, min: number, max: number): number {
  return min + (max - min) * random();
}

/** Rejection-sampled point strictly inside the unit sphere. */
export function randomInUnitSphere(random: Random): Vector3 {
  for (;;) {
    const p = new Vector3(
      randomRange(random, -1, 1),
      randomRange(random, -1, 1),
      randomRange(random, -1, 1),
    );
    if (p.lengthSquared() < 1) return p;
  }
}
