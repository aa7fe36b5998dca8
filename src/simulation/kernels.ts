/**
 * Kernel registry: resolves the program's named entry points to handles once,
 * at initialization. Handles are frozen and compared by identity afterwards.
 */

import { KernelNotFoundError } from './errors';

export const KERNEL_NAMES = [
  'IntegrationAndGlobalShapeConstraints',
  'LocalShapeConstraints',
  'LengthConstraintsAndWind',
  'CollisionAndTangents',
  'SkipSimulateHair',
] as const;

export type KernelName = (typeof KERNEL_NAMES)[number];

export interface KernelHandle {
  readonly name: KernelName;
  /** Position of the entry point in the compiled program. */
  readonly id: number;
}

export type KernelSet = Readonly<Record<KernelName, KernelHandle>>;

export function isKernelName(name: string): name is KernelName {
  const names: readonly string[] = KERNEL_NAMES;
  return names.includes(name);
}

export class KernelRegistry {
  private readonly handles = new Map<KernelName, KernelHandle>();

  constructor(private readonly entryPoints: readonly string[]) {}

  resolve(name: KernelName): KernelHandle {
    const cached = this.handles.get(name);
    if (cached) return cached;

    const id = this.entryPoints.indexOf(name);
    if (id < 0) {
      throw new KernelNotFoundError(name, this.entryPoints);
    }
    const handle: KernelHandle = Object.freeze({ name, id });
    this.handles.set(name, handle);
    return handle;
  }

  /** Resolve every kernel the pipeline needs; fails on the first missing one. */
  resolveAll(): KernelSet {
    return {
      IntegrationAndGlobalShapeConstraints: this.resolve('IntegrationAndGlobalShapeConstraints'),
      LocalShapeConstraints: this.resolve('LocalShapeConstraints'),
      LengthConstraintsAndWind: this.resolve('LengthConstraintsAndWind'),
      CollisionAndTangents: this.resolve('CollisionAndTangents'),
      SkipSimulateHair: this.resolve('SkipSimulateHair'),
    };
  }
}

const ENTRY_POINT_PATTERN = /((?:@[A-Za-z_]\w*(?:\s*\([^)]*\))?\s*)+)fn\s+([A-Za-z_]\w*)/g;

/**
 * List the compute entry points declared in a WGSL program, in source order.
 */
export function parseComputeEntryPoints(wgsl: string): string[] {
  const names: string[] = [];
  for (const match of wgsl.matchAll(ENTRY_POINT_PATTERN)) {
    const attributes = match[1];
    const name = match[2];
    if (attributes && name && /@compute\b/.test(attributes)) {
      names.push(name);
    }
  }
  return names;
}
