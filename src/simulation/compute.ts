/**
 * Frame orchestrator: binds the per-frame uniforms and the shared buffers,
 * then dispatches the enabled stages in fixed order, one pass each.
 * Public API: createHairSimulation(), stepHairSimulation(), resetHairSimulation(),
 * destroyHairSimulation().
 */

import type { ComputeBackend, ComputeBuffer } from '../compute/backend';
import type {
  FrameContext,
  FrameStats,
  HairAsset,
  HairSimulationParams,
  PipelineStages,
  StrandGeometry,
} from '../types/simulation';
import { mat4Identity, mat4TryInvert, type Mat4 } from '../math/vecmath';
import { bindingsForKernel, type ResourceTable } from './bindings';
import { workgroupsForKernel, type TopologyCounts } from './dispatch';
import { KernelRegistry, type KernelHandle, type KernelName, type KernelSet } from './kernels';
import { cloneParams, DEFAULT_HAIR_PARAMS, validateParams } from './params';
import { SimulationStateStore } from './stateStore';
import { resetStrandGeometry } from './geometry';
import { uniformVerticesPerStrand } from './strands';
import { HAIR_UNIFORMS_SIZE, packHairUniforms, type HairUniforms } from './uniforms';
import { InvalidHairAssetError, MissingDependencyError } from './errors';

export interface SimulationContext {
  backend: ComputeBackend;
  geometry: StrandGeometry;
  state: SimulationStateStore;
  kernels: KernelSet;
  paramsUniform: ComputeBuffer;
  params: HairSimulationParams;
  /** Inverse of the model transform used by the previous frame. */
  modelPrevInvTransform: Mat4;
  /** Frames stepped since creation or the last reset. */
  frame: number;
  /** Milliseconds spent in the last step. */
  computationTime: number;
}

export interface PlannedDispatch {
  kernel: KernelHandle;
  workgroups: number;
}

/** Dispatch order of the simulation stages. */
const STAGE_ORDER: readonly (readonly [keyof PipelineStages, KernelName])[] = [
  ['integrationAndGlobalShape', 'IntegrationAndGlobalShapeConstraints'],
  ['localShape', 'LocalShapeConstraints'],
  ['lengthAndWind', 'LengthConstraintsAndWind'],
  ['collisionAndTangents', 'CollisionAndTangents'],
];

/** Count and size mismatches between the geometry buffers and the asset. */
function geometryProblems(geometry: StrandGeometry, asset: HairAsset): string[] {
  const problems: string[] = [];
  if (geometry.vertexCount !== asset.vertexCount || geometry.strandCount !== asset.strandCount) {
    problems.push(
      `geometry has ${geometry.strandCount} strands / ${geometry.vertexCount} vertices, ` +
        `asset has ${asset.strandCount} / ${asset.vertexCount}`
    );
  }
  const needed = asset.vertexCount * 3 * 4;
  for (const buffer of [geometry.initialPositions, geometry.positions, geometry.previousPositions]) {
    if (buffer.byteLength < needed) {
      problems.push(`${buffer.label} holds ${buffer.byteLength} bytes, ${asset.vertexCount} vertices need ${needed}`);
    }
  }
  return problems;
}

/**
 * Create the simulation for a strand geometry and its hair asset. Kernels are
 * resolved before anything is allocated. The params are copied.
 */
export async function createHairSimulation(
  backend: ComputeBackend,
  geometry: StrandGeometry | null | undefined,
  asset: HairAsset,
  params: HairSimulationParams = DEFAULT_HAIR_PARAMS
): Promise<SimulationContext> {
  if (!geometry) {
    throw new MissingDependencyError('strand geometry', 'the simulation needs vertex position buffers');
  }
  const problems = geometryProblems(geometry, asset);
  if (problems.length > 0) {
    throw new InvalidHairAssetError(problems);
  }
  validateParams(params);

  const kernels = new KernelRegistry(backend.entryPoints).resolveAll();
  const state = await SimulationStateStore.initialize(backend, asset);
  let paramsUniform: ComputeBuffer | null = null;
  try {
    paramsUniform = backend.createBuffer('params', HAIR_UNIFORMS_SIZE, 'uniform');
    await backend.flushAllocations();
  } catch (err) {
    if (paramsUniform) backend.destroyBuffer(paramsUniform);
    state.destroy();
    throw err;
  }

  const perStrand = uniformVerticesPerStrand(asset.vertexOffsets, asset.vertexCount);
  console.log(
    `[HairSimulation] Created on ${backend.kind} backend: ${asset.strandCount} strands, ` +
      `${perStrand ?? 'mixed'} vertices per strand`
  );
  return {
    backend,
    geometry,
    state,
    kernels,
    paramsUniform,
    params: cloneParams(params),
    modelPrevInvTransform: mat4Identity(),
    frame: 0,
    computationTime: 0,
  };
}

/** Replace the parameters used from the next frame on. Throws RangeError on invalid values. */
export function updateHairParams(ctx: SimulationContext, params: HairSimulationParams): void {
  ctx.params = cloneParams(validateParams(params));
}

/**
 * Kernels to dispatch for one frame with their group counts. Disabled and
 * empty stages are left out; a paused simulation only snaps to the rest pose.
 */
export function planFrame(params: HairSimulationParams, counts: TopologyCounts, kernels: KernelSet): PlannedDispatch[] {
  const names: KernelName[] = params.paused
    ? ['SkipSimulateHair']
    : STAGE_ORDER.filter(([stage]) => params.stages[stage]).map(([, kernel]) => kernel);

  return names
    .map((name) => ({ kernel: kernels[name], workgroups: workgroupsForKernel(name, counts) }))
    .filter((d) => d.workgroups > 0);
}

export function frameUniforms(ctx: SimulationContext, frame: FrameContext): HairUniforms {
  const { params, state } = ctx;
  return {
    modelTransform: frame.modelTransform,
    modelPrevInvTransform: ctx.modelPrevInvTransform,
    modelRotation: frame.modelRotation,
    gravity: params.gravity,
    timeStep: frame.timeStep,
    wind: params.wind,
    globalStiffness: params.stiffnessForGlobalShapeMatching,
    globalRange: params.globalShapeMatchingEffectiveRange,
    localStiffness: params.stiffnessForLocalShapeMatching,
    damping: params.damping,
    numStrands: state.strandCount,
    numVertices: state.vertexCount,
    lengthIterations: params.lengthConstraintIterations,
    colliderEnabled: params.stages.headCollision,
  };
}

/** Every buffer a kernel may bind, by binding name. */
export function bindResources(ctx: SimulationContext): ResourceTable<ComputeBuffer> {
  const { geometry, state } = ctx;
  return {
    params: ctx.paramsUniform,
    ...state.handles,
    initialPositions: geometry.initialPositions,
    positions: geometry.positions,
    previousPositions: geometry.previousPositions,
  };
}

/**
 * Run one frame. Resolves after the dispatches are submitted, or after the
 * debug buffer is read back when diagnostics ask for it. Rejects with
 * DeviceError when the device fails the frame or has been lost.
 */
export async function stepHairSimulation(ctx: SimulationContext, frame: FrameContext): Promise<FrameStats> {
  if (!Number.isFinite(frame.timeStep) || frame.timeStep < 0) {
    throw new RangeError(`timeStep must be a finite number >= 0, got ${frame.timeStep}`);
  }
  if (ctx.state.destroyed) {
    throw new Error('[HairSimulation] step after destroy');
  }
  const start = performance.now();
  const { backend, state } = ctx;
  const counts: TopologyCounts = { strandCount: state.strandCount, vertexCount: state.vertexCount };

  backend.writeBuffer(ctx.paramsUniform, packHairUniforms(frameUniforms(ctx, frame)));
  const resources = bindResources(ctx);
  const plan = planFrame(ctx.params, counts, ctx.kernels);

  backend.beginFrame();
  try {
    for (const { kernel, workgroups } of plan) {
      backend.dispatch(kernel, bindingsForKernel(kernel.name, resources), workgroups);
    }
  } catch (err) {
    await backend.endFrame().catch((frameErr: unknown) => {
      console.error('[HairSimulation] Frame end failed after a dispatch error', frameErr);
    });
    throw err;
  }
  await backend.endFrame();

  let debug: Float32Array | null = null;
  if (ctx.params.diagnostics.readbackDebugBuffer) {
    debug = await backend.readBuffer(state.handles.debug, new Float32Array(state.vertexCount * 3));
  }

  ctx.computationTime = performance.now() - start;
  // a singular transform keeps the last invertible one
  mat4TryInvert(frame.modelTransform, ctx.modelPrevInvTransform);
  ctx.frame += 1;

  return {
    frame: ctx.frame,
    computationTime: ctx.computationTime,
    dispatched: plan.map((d) => d.kernel.name),
    debug,
  };
}

/**
 * Put the hair back in its rest pose without reallocating: positions from the
 * initial pose, identity rotations, identity previous transform.
 */
export function resetHairSimulation(ctx: SimulationContext): void {
  resetStrandGeometry(ctx.backend, ctx.geometry);
  ctx.state.resetRotations();
  mat4Identity(ctx.modelPrevInvTransform);
  ctx.frame = 0;
  console.log('[HairSimulation] Reset to rest pose');
}

/** Release the simulation's own buffers. The strand geometry stays with its owner. */
export function destroyHairSimulation(ctx: SimulationContext): void {
  if (ctx.state.destroyed) return;
  ctx.state.destroy();
  ctx.backend.destroyBuffer(ctx.paramsUniform);
}
