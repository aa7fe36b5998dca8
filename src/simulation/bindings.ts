/**
 * Binding table shared by hairSimulation.wgsl, the WebGPU bind group layouts
 * and the CPU kernels. Every kernel declares the resources it depends on; the
 * orchestrator binds exactly those.
 */

import type { KernelName } from './kernels';

export type BindingName =
  | 'params'
  | 'vertexOffsets'
  | 'initialPositions'
  | 'positions'
  | 'previousPositions'
  | 'restLengths'
  | 'globalRotations'
  | 'localRotations'
  | 'referenceVectors'
  | 'tangents'
  | 'collider'
  | 'debug';

export type BindingAccess = 'uniform' | 'read-only-storage' | 'storage';

export interface BindingSlot {
  binding: number;
  access: BindingAccess;
}

/** Slot numbers match the @binding attributes in hairSimulation.wgsl (group 0). */
export const BINDING_SLOTS: Readonly<Record<BindingName, BindingSlot>> = {
  params: { binding: 0, access: 'uniform' },
  vertexOffsets: { binding: 1, access: 'read-only-storage' },
  initialPositions: { binding: 2, access: 'read-only-storage' },
  positions: { binding: 3, access: 'storage' },
  previousPositions: { binding: 4, access: 'storage' },
  restLengths: { binding: 5, access: 'read-only-storage' },
  globalRotations: { binding: 6, access: 'storage' },
  localRotations: { binding: 7, access: 'storage' },
  referenceVectors: { binding: 8, access: 'read-only-storage' },
  tangents: { binding: 9, access: 'storage' },
  collider: { binding: 10, access: 'read-only-storage' },
  debug: { binding: 11, access: 'storage' },
};

const VERTEX_POSITIONS = ['initialPositions', 'positions', 'previousPositions'] as const;

/** Declared dependencies per kernel. */
export const KERNEL_LAYOUTS: Readonly<Record<KernelName, readonly BindingName[]>> = {
  IntegrationAndGlobalShapeConstraints: ['params', 'vertexOffsets', ...VERTEX_POSITIONS],
  LocalShapeConstraints: [
    'params',
    'vertexOffsets',
    'globalRotations',
    'localRotations',
    'referenceVectors',
    'debug',
    ...VERTEX_POSITIONS,
  ],
  LengthConstraintsAndWind: ['params', 'vertexOffsets', 'restLengths', ...VERTEX_POSITIONS],
  CollisionAndTangents: ['params', 'vertexOffsets', 'collider', 'tangents', ...VERTEX_POSITIONS],
  SkipSimulateHair: ['params', ...VERTEX_POSITIONS],
};

export type ResourceTable<B> = Readonly<Record<BindingName, B>>;

export type KernelBindings<B> = Partial<Record<BindingName, B>>;

/**
 * Pick the resources a kernel declares out of the full table.
 */
export function bindingsForKernel<B>(kernel: KernelName, resources: ResourceTable<B>): KernelBindings<B> {
  const bindings: KernelBindings<B> = {};
  for (const name of KERNEL_LAYOUTS[kernel]) {
    bindings[name] = resources[name];
  }
  return bindings;
}
