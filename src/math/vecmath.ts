/**
 * Small vector / quaternion / matrix helpers shared by the host-side uniform
 * packing and the CPU kernels. Quaternions are [x, y, z, w]; matrices are
 * column-major Float32Array(16), the layout WGSL mat4x4<f32> expects.
 */

export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];
export type Mat4 = Float32Array;

const EPSILON = 1e-8;

export function vec3Add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function vec3Subtract(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function vec3Scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function vec3Dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function vec3Cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function vec3Length(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function vec3Distance(a: Vec3, b: Vec3): number {
  return vec3Length(vec3Subtract(a, b));
}

/** Zero vector for degenerate input. */
export function vec3Normalize(v: Vec3): Vec3 {
  const len = vec3Length(v);
  if (len < EPSILON) return [0, 0, 0];
  return [v[0] / len, v[1] / len, v[2] / len];
}

export function quatIdentity(): Quat {
  return [0, 0, 0, 1];
}

/**
 * Multiply two quaternions: q1 * q2 (apply q2 first, then q1).
 */
export function quatMultiply(q1: Quat, q2: Quat): Quat {
  const [x1, y1, z1, w1] = q1;
  const [x2, y2, z2, w2] = q2;

  return [
    w1 * x2 + x1 * w2 + y1 * z2 - z1 * y2,
    w1 * y2 - x1 * z2 + y1 * w2 + z1 * x2,
    w1 * z2 + x1 * y2 - y1 * x2 + z1 * w2,
    w1 * w2 - x1 * x2 - y1 * y2 - z1 * z2,
  ];
}

/**
 * Quaternion conjugate (inverse for unit quaternions).
 */
export function quatConjugate(q: Quat): Quat {
  return [-q[0], -q[1], -q[2], q[3]];
}

export function quatLength(q: Quat): number {
  return Math.sqrt(q[0] * q[0] + q[1] * q[1] + q[2] * q[2] + q[3] * q[3]);
}

export function quatNormalize(q: Quat): Quat {
  const len = quatLength(q);
  if (len < EPSILON) return [0, 0, 0, 1];
  return [q[0] / len, q[1] / len, q[2] / len, q[3] / len];
}

export function quatFromAxisAngle(axis: Vec3, angle: number): Quat {
  const n = vec3Normalize(axis);
  const s = Math.sin(angle / 2);
  return [n[0] * s, n[1] * s, n[2] * s, Math.cos(angle / 2)];
}

/**
 * Rotate v by unit quaternion q (q * v * q^-1), expanded form.
 */
export function quatRotateVector(q: Quat, v: Vec3): Vec3 {
  const u: Vec3 = [q[0], q[1], q[2]];
  const w = q[3];
  const t = vec3Scale(vec3Cross(u, v), 2);
  return vec3Add(vec3Add(v, vec3Scale(t, w)), vec3Cross(u, t));
}

/**
 * Shortest-arc rotation taking unit vector `from` onto unit vector `to`.
 *
 * Uses the half-way form (cross, 1 + dot) so small angles keep their precision;
 * only the antiparallel case needs an explicit axis.
 */
export function quatFromTwoUnitVectors(from: Vec3, to: Vec3): Quat {
  const dot = vec3Dot(from, to);

  if (dot < -1 + 1e-6) {
    let axis = vec3Cross(from, [1, 0, 0]);
    if (vec3Dot(axis, axis) < 1e-6) {
      axis = vec3Cross(from, [0, 1, 0]);
    }
    const n = vec3Normalize(axis);
    return [n[0], n[1], n[2], 0];
  }

  const cross = vec3Cross(from, to);
  return quatNormalize([cross[0], cross[1], cross[2], 1 + dot]);
}

export function mat4Identity(out: Mat4 = new Float32Array(16)): Mat4 {
  out.fill(0);
  out[0] = 1;
  out[5] = 1;
  out[10] = 1;
  out[15] = 1;
  return out;
}

/**
 * Build a column-major transform from a rotation, translation and uniform scale.
 */
export function mat4FromRotationTranslation(
  q: Quat,
  t: Vec3,
  scale = 1,
  out: Mat4 = new Float32Array(16)
): Mat4 {
  const [x, y, z, w] = q;
  const x2 = x + x;
  const y2 = y + y;
  const z2 = z + z;
  const xx = x * x2;
  const xy = x * y2;
  const xz = x * z2;
  const yy = y * y2;
  const yz = y * z2;
  const zz = z * z2;
  const wx = w * x2;
  const wy = w * y2;
  const wz = w * z2;

  out[0] = (1 - (yy + zz)) * scale;
  out[1] = (xy + wz) * scale;
  out[2] = (xz - wy) * scale;
  out[3] = 0;

  out[4] = (xy - wz) * scale;
  out[5] = (1 - (xx + zz)) * scale;
  out[6] = (yz + wx) * scale;
  out[7] = 0;

  out[8] = (xz + wy) * scale;
  out[9] = (yz - wx) * scale;
  out[10] = (1 - (xx + yy)) * scale;
  out[11] = 0;

  out[12] = t[0];
  out[13] = t[1];
  out[14] = t[2];
  out[15] = 1;
  return out;
}

/**
 * Invert a 4x4 matrix. Singular input yields identity.
 */
export function mat4Invert(m: Mat4, out: Mat4 = new Float32Array(16)): Mat4 {
  if (!mat4TryInvert(m, out)) {
    console.warn('[mat4Invert] Singular matrix, returning identity');
    mat4Identity(out);
  }
  return out;
}

/**
 * Write the inverse of `m` into `out` and return true, or return false and
 * leave `out` untouched when `m` is singular.
 */
export function mat4TryInvert(m: Mat4, out: Mat4): boolean {
  const a00 = m[0], a01 = m[1], a02 = m[2], a03 = m[3];
  const a10 = m[4], a11 = m[5], a12 = m[6], a13 = m[7];
  const a20 = m[8], a21 = m[9], a22 = m[10], a23 = m[11];
  const a30 = m[12], a31 = m[13], a32 = m[14], a33 = m[15];

  const b00 = a00 * a11 - a01 * a10;
  const b01 = a00 * a12 - a02 * a10;
  const b02 = a00 * a13 - a03 * a10;
  const b03 = a01 * a12 - a02 * a11;
  const b04 = a01 * a13 - a03 * a11;
  const b05 = a02 * a13 - a03 * a12;
  const b06 = a20 * a31 - a21 * a30;
  const b07 = a20 * a32 - a22 * a30;
  const b08 = a20 * a33 - a23 * a30;
  const b09 = a21 * a32 - a22 * a31;
  const b10 = a21 * a33 - a23 * a31;
  const b11 = a22 * a33 - a23 * a32;

  let det = b00 * b11 - b01 * b10 + b02 * b09 + b03 * b08 - b04 * b07 + b05 * b06;

  if (!det) {
    return false;
  }

  det = 1.0 / det;

  out[0] = (a11 * b11 - a12 * b10 + a13 * b09) * det;
  out[1] = (a02 * b10 - a01 * b11 - a03 * b09) * det;
  out[2] = (a31 * b05 - a32 * b04 + a33 * b03) * det;
  out[3] = (a22 * b04 - a21 * b05 - a23 * b03) * det;
  out[4] = (a12 * b08 - a10 * b11 - a13 * b07) * det;
  out[5] = (a00 * b11 - a02 * b08 + a03 * b07) * det;
  out[6] = (a32 * b02 - a30 * b05 - a33 * b01) * det;
  out[7] = (a20 * b05 - a22 * b02 + a23 * b01) * det;
  out[8] = (a10 * b10 - a11 * b08 + a13 * b06) * det;
  out[9] = (a01 * b08 - a00 * b10 - a03 * b06) * det;
  out[10] = (a30 * b04 - a31 * b02 + a33 * b00) * det;
  out[11] = (a21 * b02 - a20 * b04 - a23 * b00) * det;
  out[12] = (a11 * b07 - a10 * b09 - a12 * b06) * det;
  out[13] = (a00 * b09 - a01 * b07 + a02 * b06) * det;
  out[14] = (a31 * b01 - a30 * b03 - a32 * b00) * det;
  out[15] = (a20 * b03 - a21 * b01 + a22 * b00) * det;

  return true;
}

/**
 * Transform a point by a column-major matrix (rotation, scale and translation).
 */
export function mat4TransformPoint(mat: Mat4, point: Vec3): Vec3 {
  const [x, y, z] = point;
  return [
    mat[0] * x + mat[4] * y + mat[8] * z + mat[12],
    mat[1] * x + mat[5] * y + mat[9] * z + mat[13],
    mat[2] * x + mat[6] * y + mat[10] * z + mat[14],
  ];
}
