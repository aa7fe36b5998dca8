/**
 * CPU versions of the hairSimulation.wgsl entry points. One call runs one
 * workgroup; threads within a group run phase by phase so that the code after
 * a WGSL storageBarrier() sees every write made before it.
 */

import type { KernelName } from '../simulation/kernels';
import type { HairUniforms } from '../simulation/uniforms';
import { assignThread, KERNEL_DOMAINS, WORKGROUP_SIZE } from '../simulation/dispatch';
import {
  mat4TransformPoint,
  quatConjugate,
  quatFromTwoUnitVectors,
  quatIdentity,
  quatMultiply,
  quatNormalize,
  quatRotateVector,
  vec3Add,
  vec3Length,
  vec3Normalize,
  vec3Scale,
  vec3Subtract,
  type Quat,
  type Vec3,
} from '../math/vecmath';
import { resolveCapsulePenetration, unpackCapsule } from '../collision/capsule';

export interface CpuKernelEnv {
  params: HairUniforms;
  vertexOffsets: Uint32Array;
  initialPositions: Float32Array;
  positions: Float32Array;
  previousPositions: Float32Array;
  restLengths: Float32Array;
  globalRotations: Float32Array;
  localRotations: Float32Array;
  referenceVectors: Float32Array;
  tangents: Float32Array;
  collider: Float32Array;
  debug: Float32Array;
}

export type CpuKernel = (env: CpuKernelEnv, group: number) => void;

function read3(data: Float32Array, i: number): Vec3 {
  return [data[i * 3], data[i * 3 + 1], data[i * 3 + 2]];
}

function write3(data: Float32Array, i: number, v: Vec3): void {
  data[i * 3] = v[0];
  data[i * 3 + 1] = v[1];
  data[i * 3 + 2] = v[2];
}

function read4(data: Float32Array, i: number): Quat {
  return [data[i * 4], data[i * 4 + 1], data[i * 4 + 2], data[i * 4 + 3]];
}

function write4(data: Float32Array, i: number, q: Quat): void {
  data.set(q, i * 4);
}

function strandEnd(env: CpuKernelEnv, strand: number): number {
  return strand + 1 < env.params.numStrands ? env.vertexOffsets[strand + 1] : env.params.numVertices;
}

interface StrandVertexThread {
  strand: number;
  slot: number;
  start: number;
  end: number;
  active: boolean;
}

/** Threads of one `strand-vertices` group, with the kernels' bounds checks applied. */
function strandVertexThreads(env: CpuKernelEnv, kernel: KernelName, group: number): StrandVertexThread[] {
  const threads: StrandVertexThread[] = [];
  for (let local = 0; local < WORKGROUP_SIZE; local++) {
    const { item: strand, slot } = assignThread(KERNEL_DOMAINS[kernel], group, local);
    if (strand >= env.params.numStrands) {
      threads.push({ strand, slot, start: 0, end: 0, active: false });
      continue;
    }
    const start = env.vertexOffsets[strand];
    const end = strandEnd(env, strand);
    threads.push({ strand, slot, start, end, active: slot < end - start });
  }
  return threads;
}

const integrationAndGlobalShapeConstraints: CpuKernel = (env, group) => {
  const { params } = env;
  const dt2 = params.timeStep * params.timeStep;

  for (const t of strandVertexThreads(env, 'IntegrationAndGlobalShapeConstraints', group)) {
    if (!t.active) continue;
    const i = t.start + t.slot;
    const restWorld = mat4TransformPoint(params.modelTransform, read3(env.initialPositions, i));

    if (t.slot === 0) {
      write3(env.positions, i, restWorld);
      write3(env.previousPositions, i, restWorld);
      continue;
    }

    const current = read3(env.positions, i);
    const previous = read3(env.previousPositions, i);
    let next = vec3Add(
      vec3Add(current, vec3Scale(vec3Subtract(current, previous), 1 - params.damping)),
      vec3Scale(params.gravity, dt2)
    );
    if (params.globalStiffness > 0 && t.slot < params.globalRange * (t.end - t.start)) {
      next = vec3Add(next, vec3Scale(vec3Subtract(restWorld, next), params.globalStiffness));
    }
    write3(env.previousPositions, i, current);
    write3(env.positions, i, next);
  }
};

const localShapeConstraints: CpuKernel = (env, group) => {
  const { params } = env;
  const modelRotation = quatNormalize(params.modelRotation);
  const invModel = quatConjugate(modelRotation);

  for (let local = 0; local < WORKGROUP_SIZE; local++) {
    const strand = assignThread('strands', group, local).item;
    if (strand >= params.numStrands) continue;
    const start = env.vertexOffsets[strand];
    const end = strandEnd(env, strand);

    for (let v = start; v < end; v++) write3(env.debug, v, [0, 0, 0]);

    let frame = quatNormalize(quatMultiply(modelRotation, read4(env.globalRotations, start)));
    for (let i = start; i + 1 < end; i++) {
      let p = read3(env.positions, i);
      let pn = read3(env.positions, i + 1);
      const reference = read3(env.referenceVectors, i + 1);
      const goal = vec3Add(p, quatRotateVector(frame, reference));
      const delta = vec3Scale(vec3Subtract(goal, pn), params.localStiffness * 0.5);

      if (i === start) {
        pn = vec3Add(pn, vec3Scale(delta, 2));
        write3(env.debug, i + 1, vec3Add(read3(env.debug, i + 1), vec3Scale(delta, 2)));
      } else {
        p = vec3Subtract(p, delta);
        pn = vec3Add(pn, delta);
        write3(env.debug, i, vec3Subtract(read3(env.debug, i), delta));
        write3(env.debug, i + 1, vec3Add(read3(env.debug, i + 1), delta));
      }
      write3(env.positions, i, p);
      write3(env.positions, i + 1, pn);

      const edge = quatRotateVector(quatConjugate(frame), vec3Subtract(pn, p));
      const fromDir = vec3Normalize(reference);
      const toDir = vec3Normalize(edge);
      const segment =
        vec3Length(fromDir) > 0 && vec3Length(toDir) > 0 ? quatFromTwoUnitVectors(fromDir, toDir) : quatIdentity();
      frame = quatNormalize(quatMultiply(frame, segment));
      write4(env.localRotations, i + 1, segment);
      write4(env.globalRotations, i + 1, quatNormalize(quatMultiply(invModel, frame)));
    }
  }
};

const lengthConstraintsAndWind: CpuKernel = (env, group) => {
  const { params } = env;
  const threads = strandVertexThreads(env, 'LengthConstraintsAndWind', group);
  const windStep = vec3Scale(params.wind, params.timeStep * params.timeStep);

  for (const t of threads) {
    if (!t.active || t.slot === 0) continue;
    const i = t.start + t.slot;
    write3(env.positions, i, vec3Add(read3(env.positions, i), windStep));
  }

  // storageBarrier()

  for (const t of threads) {
    if (!t.active || t.slot !== 0) continue;
    for (let iter = 0; iter < params.lengthIterations; iter++) {
      for (let i = t.start; i + 1 < t.end; i++) {
        let p = read3(env.positions, i);
        let pn = read3(env.positions, i + 1);
        const d = vec3Subtract(pn, p);
        const len = vec3Length(d);
        if (len < 1e-8) continue;
        const correction = vec3Scale(d, (len - env.restLengths[i]) / len);
        if (i === t.start) {
          pn = vec3Subtract(pn, correction);
        } else {
          p = vec3Add(p, vec3Scale(correction, 0.5));
          pn = vec3Subtract(pn, vec3Scale(correction, 0.5));
        }
        write3(env.positions, i, p);
        write3(env.positions, i + 1, pn);
      }
    }
  }
};

const collisionAndTangents: CpuKernel = (env, group) => {
  const { params } = env;
  const threads = strandVertexThreads(env, 'CollisionAndTangents', group);

  if (params.colliderEnabled) {
    const capsule = unpackCapsule(env.collider);
    const m = params.modelTransform;
    const a = mat4TransformPoint(m, capsule.p0);
    const b = mat4TransformPoint(m, capsule.p1);
    const radius = capsule.radius * vec3Length([m[0], m[1], m[2]]);

    for (const t of threads) {
      if (!t.active || t.slot === 0) continue;
      const i = t.start + t.slot;
      const surface = resolveCapsulePenetration(read3(env.positions, i), a, b, radius);
      if (!surface) continue;
      write3(env.positions, i, surface);
      const prevInModel = mat4TransformPoint(params.modelPrevInvTransform, read3(env.previousPositions, i));
      write3(env.previousPositions, i, mat4TransformPoint(m, prevInModel));
    }
  }

  // storageBarrier()

  for (const t of threads) {
    if (!t.active) continue;
    const i = t.start + t.slot;
    const count = t.end - t.start;
    let tangent: Vec3 = [0, 0, 0];
    if (count > 1) {
      tangent =
        t.slot + 1 < count
          ? vec3Normalize(vec3Subtract(read3(env.positions, i + 1), read3(env.positions, i)))
          : vec3Normalize(vec3Subtract(read3(env.positions, i), read3(env.positions, i - 1)));
    }
    write4(env.tangents, i, [tangent[0], tangent[1], tangent[2], 0]);
  }
};

const skipSimulateHair: CpuKernel = (env, group) => {
  const { params } = env;
  for (let local = 0; local < WORKGROUP_SIZE; local++) {
    const i = assignThread('vertices', group, local).item;
    if (i >= params.numVertices) continue;
    const p = mat4TransformPoint(params.modelTransform, read3(env.initialPositions, i));
    write3(env.positions, i, p);
    write3(env.previousPositions, i, p);
  }
};

export const CPU_KERNELS: Readonly<Record<KernelName, CpuKernel>> = {
  IntegrationAndGlobalShapeConstraints: integrationAndGlobalShapeConstraints,
  LocalShapeConstraints: localShapeConstraints,
  LengthConstraintsAndWind: lengthConstraintsAndWind,
  CollisionAndTangents: collisionAndTangents,
  SkipSimulateHair: skipSimulateHair,
};
