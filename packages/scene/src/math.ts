/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Matrix utilities for scene transforms
 *
 * Matrices are column-major and transform column vectors, so
 * `multiply(parent, local)` applies `local` first.
 */

import type { Vec3, Mat4 } from './types.js';

export class MathUtils {
    /**
     * Create identity matrix
     */
    static identity(): Mat4 {
        const m = new Float64Array(16);
        m[0] = 1; m[5] = 1; m[10] = 1; m[15] = 1;
        return { m };
    }

    /**
     * Create matrix from 16 column-major values
     */
    static fromArray(values: ArrayLike<number>): Mat4 {
        if (values.length !== 16) {
            throw new RangeError(`Expected 16 matrix elements, got ${values.length}`);
        }
        return { m: Float64Array.from(values) };
    }

    /**
     * Create translation matrix
     */
    static translation(v: Vec3): Mat4 {
        const out = MathUtils.identity();
        out.m[12] = v.x;
        out.m[13] = v.y;
        out.m[14] = v.z;
        return out;
    }

    /**
     * Create scaling matrix
     */
    static scaling(v: Vec3): Mat4 {
        const out = MathUtils.identity();
        out.m[0] = v.x;
        out.m[5] = v.y;
        out.m[10] = v.z;
        return out;
    }

    /**
     * Multiply matrices (a * b)
     */
    static multiply(a: Mat4, b: Mat4): Mat4 {
        const out = new Float64Array(16);
        const a00 = a.m[0], a01 = a.m[1], a02 = a.m[2], a03 = a.m[3];
        const a10 = a.m[4], a11 = a.m[5], a12 = a.m[6], a13 = a.m[7];
        const a20 = a.m[8], a21 = a.m[9], a22 = a.m[10], a23 = a.m[11];
        const a30 = a.m[12], a31 = a.m[13], a32 = a.m[14], a33 = a.m[15];

        const b00 = b.m[0], b01 = b.m[1], b02 = b.m[2], b03 = b.m[3];
        const b10 = b.m[4], b11 = b.m[5], b12 = b.m[6], b13 = b.m[7];
        const b20 = b.m[8], b21 = b.m[9], b22 = b.m[10], b23 = b.m[11];
        const b30 = b.m[12], b31 = b.m[13], b32 = b.m[14], b33 = b.m[15];

        out[0] = b00 * a00 + b01 * a10 + b02 * a20 + b03 * a30;
        out[1] = b00 * a01 + b01 * a11 + b02 * a21 + b03 * a31;
        out[2] = b00 * a02 + b01 * a12 + b02 * a22 + b03 * a32;
        out[3] = b00 * a03 + b01 * a13 + b02 * a23 + b03 * a33;
        out[4] = b10 * a00 + b11 * a10 + b12 * a20 + b13 * a30;
        out[5] = b10 * a01 + b11 * a11 + b12 * a21 + b13 * a31;
        out[6] = b10 * a02 + b11 * a12 + b12 * a22 + b13 * a32;
        out[7] = b10 * a03 + b11 * a13 + b12 * a23 + b13 * a33;
        out[8] = b20 * a00 + b21 * a10 + b22 * a20 + b23 * a30;
        out[9] = b20 * a01 + b21 * a11 + b22 * a21 + b23 * a31;
        out[10] = b20 * a02 + b21 * a12 + b22 * a22 + b23 * a32;
        out[11] = b20 * a03 + b21 * a13 + b22 * a23 + b23 * a33;
        out[12] = b30 * a00 + b31 * a10 + b32 * a20 + b33 * a30;
        out[13] = b30 * a01 + b31 * a11 + b32 * a21 + b33 * a31;
        out[14] = b30 * a02 + b31 * a12 + b32 * a22 + b33 * a32;
        out[15] = b30 * a03 + b31 * a13 + b32 * a23 + b33 * a33;

        return { m: out };
    }

    /**
     * Scale the basis of a matrix (equivalent to a * scaling(v))
     */
    static scale(a: Mat4, v: Vec3): Mat4 {
        const out = Float64Array.from(a.m);
        for (let i = 0; i < 4; i++) {
            out[i] *= v.x;
            out[4 + i] *= v.y;
            out[8 + i] *= v.z;
        }
        return { m: out };
    }

    /**
     * Transform vec3 by matrix (as point, w=1)
     */
    static transformPoint(m: Mat4, p: Vec3): Vec3 {
        const x = m.m[0] * p.x + m.m[4] * p.y + m.m[8] * p.z + m.m[12];
        const y = m.m[1] * p.x + m.m[5] * p.y + m.m[9] * p.z + m.m[13];
        const z = m.m[2] * p.x + m.m[6] * p.y + m.m[10] * p.z + m.m[14];
        const w = m.m[3] * p.x + m.m[7] * p.y + m.m[11] * p.z + m.m[15];
        return { x: x / w, y: y / w, z: z / w };
    }
}
