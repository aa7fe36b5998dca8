/**
 * Lifecycle owner for one head of hair. Fatal initialization errors disable the
 * component instead of propagating; the error is kept in `lastError`.
 */

import type { ComputeBackend } from '../compute/backend';
import type { FrameContext, FrameStats, HairAsset, HairSimulationParams, StrandGeometry } from '../types/simulation';
import {
  createHairSimulation,
  destroyHairSimulation,
  resetHairSimulation,
  stepHairSimulation,
  updateHairParams,
  type SimulationContext,
} from './compute';
import { DEFAULT_HAIR_PARAMS } from './params';
import { AllocationError, DeviceError, InvalidHairAssetError, KernelNotFoundError, MissingDependencyError } from './errors';

function isInitializationError(err: unknown): err is Error {
  return (
    err instanceof MissingDependencyError ||
    err instanceof KernelNotFoundError ||
    err instanceof AllocationError ||
    err instanceof InvalidHairAssetError ||
    err instanceof DeviceError ||
    err instanceof RangeError
  );
}

export class HairSimulation {
  enabled = false;
  lastError: Error | null = null;
  private ctx: SimulationContext | null = null;

  constructor(private readonly backend: ComputeBackend) {}

  /** Milliseconds spent in the last frame, 0 before the first one. */
  get computationTime(): number {
    return this.ctx?.computationTime ?? 0;
  }

  get context(): SimulationContext | null {
    return this.ctx;
  }

  /**
   * Resolves false (and stays disabled) when a fatal initialization error occurs.
   * Anything else is rethrown.
   */
  async initialize(
    geometry: StrandGeometry | null | undefined,
    asset: HairAsset,
    params: HairSimulationParams = DEFAULT_HAIR_PARAMS
  ): Promise<boolean> {
    this.destroy();
    try {
      this.ctx = await createHairSimulation(this.backend, geometry, asset, params);
      this.enabled = true;
      this.lastError = null;
      return true;
    } catch (err) {
      if (!isInitializationError(err)) throw err;
      console.error(`[HairSimulation] Disabled: ${err.message}`);
      this.lastError = err;
      this.enabled = false;
      return false;
    }
  }

  /** Step one frame; null while disabled. */
  async update(frame: FrameContext): Promise<FrameStats | null> {
    if (!this.enabled || !this.ctx) return null;
    return stepHairSimulation(this.ctx, frame);
  }

  setParams(params: HairSimulationParams): void {
    if (this.ctx) updateHairParams(this.ctx, params);
  }

  reset(): void {
    if (this.ctx) resetHairSimulation(this.ctx);
  }

  destroy(): void {
    if (this.ctx) {
      destroyHairSimulation(this.ctx);
      this.ctx = null;
    }
    this.enabled = false;
  }
}
