/**
 * Uniform block layout for `SimParams` in hairSimulation.wgsl, plus the
 * matrix/quaternion marshalling the host does every frame.
 *
 *   0   modelTransform          mat4x4<f32>
 *   64  modelPrevInvTransform   mat4x4<f32>
 *   128 modelRotation           vec4<f32>
 *   144 gravity                 vec3<f32>
 *   156 timeStep                f32
 *   160 wind                    vec3<f32>
 *   172 globalStiffness         f32
 *   176 globalRange             f32
 *   180 localStiffness          f32
 *   184 damping                 f32
 *   188 numStrands              u32
 *   192 numVertices             u32
 *   196 lengthIterations        u32
 *   200 colliderEnabled         u32
 *   204 pad
 */

import type { Mat4, Quat, Vec3 } from '../math/vecmath';

export const HAIR_UNIFORMS_SIZE = 208;

export interface HairUniforms {
  modelTransform: Mat4;
  modelPrevInvTransform: Mat4;
  modelRotation: Quat;
  gravity: Vec3;
  timeStep: number;
  wind: Vec3;
  globalStiffness: number;
  globalRange: number;
  localStiffness: number;
  damping: number;
  numStrands: number;
  numVertices: number;
  lengthIterations: number;
  colliderEnabled: boolean;
}

/** Copy a column-major matrix into a fresh 16-float array. */
export function matrixToFloatArray(matrix: Mat4): Float32Array {
  if (matrix.length !== 16) {
    throw new RangeError(`expected 16 matrix entries, got ${matrix.length}`);
  }
  return Float32Array.from(matrix);
}

export function quaternionToFloatArray(q: Quat): Float32Array {
  return Float32Array.of(q[0], q[1], q[2], q[3]);
}

function writeFloats(view: DataView, offset: number, values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    view.setFloat32(offset + i * 4, values[i], true);
  }
}

function readFloats(view: DataView, offset: number, count: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(view.getFloat32(offset + i * 4, true));
  }
  return out;
}

export function packHairUniforms(u: HairUniforms, target = new ArrayBuffer(HAIR_UNIFORMS_SIZE)): ArrayBuffer {
  const view = new DataView(target);
  writeFloats(view, 0, matrixToFloatArray(u.modelTransform));
  writeFloats(view, 64, matrixToFloatArray(u.modelPrevInvTransform));
  writeFloats(view, 128, quaternionToFloatArray(u.modelRotation));
  writeFloats(view, 144, u.gravity);
  view.setFloat32(156, u.timeStep, true);
  writeFloats(view, 160, u.wind);
  view.setFloat32(172, u.globalStiffness, true);
  view.setFloat32(176, u.globalRange, true);
  view.setFloat32(180, u.localStiffness, true);
  view.setFloat32(184, u.damping, true);
  view.setUint32(188, u.numStrands, true);
  view.setUint32(192, u.numVertices, true);
  view.setUint32(196, u.lengthIterations, true);
  view.setUint32(200, u.colliderEnabled ? 1 : 0, true);
  view.setUint32(204, 0, true);
  return target;
}

/** Inverse of packHairUniforms; used by the CPU kernels. */
export function unpackHairUniforms(view: DataView): HairUniforms {
  const [rx, ry, rz, rw] = readFloats(view, 128, 4);
  const [gx, gy, gz] = readFloats(view, 144, 3);
  const [wx, wy, wz] = readFloats(view, 160, 3);
  return {
    modelTransform: Float32Array.from(readFloats(view, 0, 16)),
    modelPrevInvTransform: Float32Array.from(readFloats(view, 64, 16)),
    modelRotation: [rx, ry, rz, rw],
    gravity: [gx, gy, gz],
    timeStep: view.getFloat32(156, true),
    wind: [wx, wy, wz],
    globalStiffness: view.getFloat32(172, true),
    globalRange: view.getFloat32(176, true),
    localStiffness: view.getFloat32(180, true),
    damping: view.getFloat32(184, true),
    numStrands: view.getUint32(188, true),
    numVertices: view.getUint32(192, true),
    lengthIterations: view.getUint32(196, true),
    colliderEnabled: view.getUint32(200, true) !== 0,
  };
}
