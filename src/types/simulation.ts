/**
 * Shared types for the hair simulation. Used by the state store, orchestrator,
 * backends and tests.
 */

import type { Mat4, Quat, Vec3 } from '../math/vecmath';
import type { ComputeBuffer } from '../compute/backend';

/** Capsule proxy for the head, in model space. Packed as 8 floats (p0, radius, p1, pad). */
export interface CapsuleCollider {
  p0: Vec3;
  p1: Vec3;
  radius: number;
}

/**
 * Host-supplied strand data, accepted once at initialization.
 * All per-vertex arrays are flat: 1 float per vertex for rest lengths,
 * 3 floats per vertex for reference vectors.
 */
export interface HairAsset {
  vertexCount: number;
  strandCount: number;
  /** Distance to the next vertex of the strand; 0 on the last vertex. */
  restLengths: Float32Array;
  /** Rest edge from the previous vertex, in the previous vertex's local frame. */
  referenceVectors: Float32Array;
  /** First vertex index of each strand. */
  vertexOffsets: Uint32Array;
  headCollider: CapsuleCollider;
}

/**
 * Vertex-position buffers owned by the mesh side. Positions are 3 floats per vertex.
 * Initial is the rest pose; current/previous are rewritten by the kernels.
 */
export interface StrandGeometry {
  vertexCount: number;
  strandCount: number;
  initialPositions: ComputeBuffer;
  positions: ComputeBuffer;
  previousPositions: ComputeBuffer;
  /** Host copy of the rest pose, used by reset. */
  restPose: Float32Array;
}

/** Per-frame inputs from the transform system. Not persisted. */
export interface FrameContext {
  /** Seconds since the previous frame, >= 0. */
  timeStep: number;
  /** Model-to-world transform, column-major. */
  modelTransform: Mat4;
  /** World-space rotation of the model. */
  modelRotation: Quat;
}

/** Pipeline stages that can be switched on or off. */
export interface PipelineStages {
  integrationAndGlobalShape: boolean;
  localShape: boolean;
  lengthAndWind: boolean;
  collisionAndTangents: boolean;
  /** Capsule collision inside the collision stage (tangents always run with the stage). */
  headCollision: boolean;
}

export interface DiagnosticsOptions {
  /** Copy the debug buffer back every frame. Forces a host/device sync. */
  readbackDebugBuffer: boolean;
}

/** Simulation parameters (presets map to these). */
export interface HairSimulationParams {
  stiffnessForGlobalShapeMatching: number;
  globalShapeMatchingEffectiveRange: number;
  stiffnessForLocalShapeMatching: number;
  damping: number;
  gravity: Vec3;
  wind: Vec3;
  lengthConstraintIterations: number;
  stages: PipelineStages;
  /** Freeze the hair to the transformed rest pose. */
  paused: boolean;
  diagnostics: DiagnosticsOptions;
}

/** Result of one step. */
export interface FrameStats {
  frame: number;
  /** Wall-clock milliseconds for bind + dispatch (+ readback when enabled). */
  computationTime: number;
  /** Kernels dispatched this frame, in order. */
  dispatched: string[];
  /** Debug vectors (3 floats per vertex) when readback is enabled, else null. */
  debug: Float32Array | null;
}
