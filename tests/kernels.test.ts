/**
 * Kernel registry and the compiled program's entry points.
 */

import { describe, it, expect } from 'vitest';
import { KERNEL_NAMES, KernelRegistry, isKernelName, parseComputeEntryPoints } from '../src/simulation/kernels';
import { KernelNotFoundError } from '../src/simulation/errors';
import hairSimulationWgsl from '../src/simulation/hairSimulation.wgsl?raw';

describe('parseComputeEntryPoints', () => {
  it('finds the five kernels of the bundled program in source order', () => {
    expect(parseComputeEntryPoints(hairSimulationWgsl)).toEqual([...KERNEL_NAMES]);
  });

  it('ignores helpers and non-compute entry points', () => {
    const source = `
      fn helper() -> f32 { return 1.0; }
      @vertex fn vsMain() -> @builtin(position) vec4<f32> { return vec4<f32>(); }
      @compute @workgroup_size(64)
      fn SkipSimulateHair() {}
    `;
    expect(parseComputeEntryPoints(source)).toEqual(['SkipSimulateHair']);
  });
});

describe('KernelRegistry', () => {
  it('resolves a name to a frozen handle once', () => {
    const registry = new KernelRegistry(['Other', 'LocalShapeConstraints']);
    const handle = registry.resolve('LocalShapeConstraints');
    expect(handle).toEqual({ name: 'LocalShapeConstraints', id: 1 });
    expect(Object.isFrozen(handle)).toBe(true);
    expect(registry.resolve('LocalShapeConstraints')).toBe(handle);
  });

  it('resolveAll returns a handle per kernel', () => {
    const kernels = new KernelRegistry(KERNEL_NAMES).resolveAll();
    KERNEL_NAMES.forEach((name, id) => expect(kernels[name]).toEqual({ name, id }));
  });

  it('throws KernelNotFoundError naming the missing entry point', () => {
    const registry = new KernelRegistry(KERNEL_NAMES.filter((n) => n !== 'SkipSimulateHair'));
    expect(() => registry.resolveAll()).toThrow(KernelNotFoundError);
    expect(() => registry.resolve('SkipSimulateHair')).toThrow(/Kernel "SkipSimulateHair" not found/);
  });

  it('isKernelName narrows known names only', () => {
    expect(isKernelName('CollisionAndTangents')).toBe(true);
    expect(isKernelName('main')).toBe(false);
  });
});
