/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { xxhash64, xxhash64Hex } from './hash.js';

describe('xxhash64', () => {
  it('matches the reference value for empty input', () => {
    expect(xxhash64(new Uint8Array(0))).toBe(0xef46db3751d8e999n);
    expect(xxhash64Hex('')).toBe('ef46db3751d8e999');
  });

  it('produces consistent hashes', () => {
    const data = new TextEncoder().encode('Hello, World!');
    expect(xxhash64(data)).toBe(xxhash64(data));
  });

  it('produces different hashes for different data', () => {
    expect(xxhash64Hex('Hello')).not.toBe(xxhash64Hex('World'));
  });

  it('hashes inputs longer than one stripe', () => {
    const long = 'shader network with enough characters to fill several stripes';
    expect(long.length).toBeGreaterThan(32);
    expect(xxhash64Hex(long)).toMatch(/^[0-9a-f]{16}$/);
    expect(xxhash64Hex(long)).not.toBe(xxhash64Hex(long + '!'));
  });

  it('changes with the seed', () => {
    expect(xxhash64Hex('abc', 1n)).not.toBe(xxhash64Hex('abc'));
  });
});
