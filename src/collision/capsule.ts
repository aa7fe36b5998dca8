/**
 * Capsule head proxy: packing for the collider buffer and the push-out used by
 * the collision stage (CPU side; hairSimulation.wgsl has the same math).
 */

import type { CapsuleCollider } from '../types/simulation';
import { vec3Add, vec3Dot, vec3Length, vec3Scale, vec3Subtract, type Vec3 } from '../math/vecmath';

/** vec4 (p0, radius) + vec4 (p1, pad). */
export const CAPSULE_FLOATS = 8;

export function packCapsule(collider: CapsuleCollider, target = new Float32Array(CAPSULE_FLOATS)): Float32Array {
  target[0] = collider.p0[0];
  target[1] = collider.p0[1];
  target[2] = collider.p0[2];
  target[3] = collider.radius;
  target[4] = collider.p1[0];
  target[5] = collider.p1[1];
  target[6] = collider.p1[2];
  target[7] = 0;
  return target;
}

export function unpackCapsule(data: Float32Array): CapsuleCollider {
  return {
    p0: [data[0], data[1], data[2]],
    p1: [data[4], data[5], data[6]],
    radius: data[3],
  };
}

export function closestPointOnSegment(point: Vec3, a: Vec3, b: Vec3): Vec3 {
  const ab = vec3Subtract(b, a);
  const lenSq = vec3Dot(ab, ab);
  if (lenSq < 1e-12) return a;
  const t = Math.min(1, Math.max(0, vec3Dot(vec3Subtract(point, a), ab) / lenSq));
  return vec3Add(a, vec3Scale(ab, t));
}

/**
 * Surface point for a point inside the capsule, or null when it is outside.
 * A point exactly on the axis is pushed along +Y.
 */
export function resolveCapsulePenetration(point: Vec3, a: Vec3, b: Vec3, radius: number): Vec3 | null {
  const closest = closestPointOnSegment(point, a, b);
  const offset = vec3Subtract(point, closest);
  const dist = vec3Length(offset);
  if (dist >= radius) return null;
  const normal: Vec3 = dist > 1e-8 ? vec3Scale(offset, 1 / dist) : [0, 1, 0];
  return vec3Add(closest, vec3Scale(normal, radius));
}
