/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * xxHash64, used to derive stable identifiers for shader networks
 * Based on the xxHash algorithm by Yann Collet
 */

const MASK64 = 0xFFFFFFFFFFFFFFFFn;

const PRIME64_1 = 0x9E3779B185EBCA87n;
const PRIME64_2 = 0xC2B2AE3D27D4EB4Fn;
const PRIME64_3 = 0x165667B19E3779F9n;
const PRIME64_4 = 0x85EBCA77C2B2AE63n;
const PRIME64_5 = 0x27D4EB2F165667C5n;

const encoder = new TextEncoder();

function rotl64(x: bigint, r: number): bigint {
  return ((x << BigInt(r)) | (x >> BigInt(64 - r))) & MASK64;
}

function round64(acc: bigint, input: bigint): bigint {
  return (rotl64((acc + input * PRIME64_2) & MASK64, 31) * PRIME64_1) & MASK64;
}

function mergeRound64(acc: bigint, val: bigint): bigint {
  const merged = (acc ^ round64(0n, val)) & MASK64;
  return (merged * PRIME64_1 + PRIME64_4) & MASK64;
}

function avalanche64(h: bigint): bigint {
  h = ((h ^ (h >> 33n)) * PRIME64_2) & MASK64;
  h = ((h ^ (h >> 29n)) * PRIME64_3) & MASK64;
  return (h ^ (h >> 32n)) & MASK64;
}

/**
 * Compute xxHash64 of a byte buffer
 */
export function xxhash64(bytes: Uint8Array, seed: bigint = 0n): bigint {
  const len = bytes.length;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;
  let h64: bigint;

  if (len >= 32) {
    const lanes = [
      (seed + PRIME64_1 + PRIME64_2) & MASK64,
      (seed + PRIME64_2) & MASK64,
      seed,
      (seed - PRIME64_1) & MASK64,
    ];
    for (; offset <= len - 32; offset += 32) {
      for (let lane = 0; lane < 4; lane++) {
        lanes[lane] = round64(lanes[lane], view.getBigUint64(offset + lane * 8, true));
      }
    }
    h64 = (rotl64(lanes[0], 1) + rotl64(lanes[1], 7) + rotl64(lanes[2], 12) + rotl64(lanes[3], 18)) & MASK64;
    for (const lane of lanes) {
      h64 = mergeRound64(h64, lane);
    }
  } else {
    h64 = (seed + PRIME64_5) & MASK64;
  }

  h64 = (h64 + BigInt(len)) & MASK64;

  for (; offset + 8 <= len; offset += 8) {
    h64 = (h64 ^ round64(0n, view.getBigUint64(offset, true))) & MASK64;
    h64 = (rotl64(h64, 27) * PRIME64_1 + PRIME64_4) & MASK64;
  }

  if (offset + 4 <= len) {
    h64 = (h64 ^ (BigInt(view.getUint32(offset, true)) * PRIME64_1)) & MASK64;
    h64 = (rotl64(h64, 23) * PRIME64_2 + PRIME64_3) & MASK64;
    offset += 4;
  }

  for (; offset < len; offset++) {
    h64 = (h64 ^ (BigInt(bytes[offset]) * PRIME64_5)) & MASK64;
    h64 = (rotl64(h64, 11) * PRIME64_1) & MASK64;
  }

  return avalanche64(h64);
}

/**
 * Hash the UTF-8 encoding of a string, as a 16-digit hex string
 */
export function xxhash64Hex(text: string, seed: bigint = 0n): string {
  return xxhash64(encoder.encode(text), seed).toString(16).padStart(16, '0');
}
