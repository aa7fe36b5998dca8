/**
 * Persistent per-strand/per-vertex buffers of the simulation. Allocated once
 * from the asset's counts, never resized, released by destroy().
 */

import type { ComputeBackend, ComputeBuffer, BufferUsage } from '../compute/backend';
import type { HairAsset } from '../types/simulation';
import { validateHairAsset } from './strands';
import { CAPSULE_FLOATS, packCapsule } from '../collision/capsule';

const F32 = 4;

export interface StateHandles {
  // read/write
  globalRotations: ComputeBuffer;
  localRotations: ComputeBuffer;
  tangents: ComputeBuffer;
  debug: ComputeBuffer;
  // read-only
  restLengths: ComputeBuffer;
  referenceVectors: ComputeBuffer;
  vertexOffsets: ComputeBuffer;
  collider: ComputeBuffer;
}

/** Identity quaternions, 4 floats each. */
export function identityRotations(count: number): Float32Array {
  const data = new Float32Array(count * 4);
  for (let i = 0; i < count; i++) {
    data[i * 4 + 3] = 1;
  }
  return data;
}

export class SimulationStateStore {
  private released = false;

  private constructor(
    private readonly backend: ComputeBackend,
    readonly vertexCount: number,
    readonly strandCount: number,
    readonly handles: Readonly<StateHandles>
  ) {}

  /**
   * Validate the asset, allocate every buffer and upload the static data.
   * Resolves once the device has confirmed every allocation. On failure,
   * buffers already allocated by this call are released.
   */
  static async initialize(backend: ComputeBackend, asset: HairAsset): Promise<SimulationStateStore> {
    validateHairAsset(asset);
    const { vertexCount, strandCount } = asset;

    const allocated: ComputeBuffer[] = [];
    const allocate = (label: string, byteLength: number, data?: Float32Array | Uint32Array, usage: BufferUsage = 'storage') => {
      const buffer = backend.createBuffer(label, byteLength, usage, data);
      allocated.push(buffer);
      return buffer;
    };

    try {
      const rotations = identityRotations(vertexCount);
      const handles: StateHandles = {
        globalRotations: allocate('globalRotations', vertexCount * 4 * F32, rotations),
        localRotations: allocate('localRotations', vertexCount * 4 * F32, rotations),
        tangents: allocate('tangents', vertexCount * 4 * F32),
        debug: allocate('debug', vertexCount * 3 * F32),
        restLengths: allocate('restLengths', vertexCount * F32, asset.restLengths),
        referenceVectors: allocate('referenceVectors', vertexCount * 3 * F32, asset.referenceVectors),
        vertexOffsets: allocate('vertexOffsets', strandCount * F32, asset.vertexOffsets),
        collider: allocate('collider', CAPSULE_FLOATS * F32, packCapsule(asset.headCollider)),
      };
      await backend.flushAllocations();
      console.log(`[StateStore] Allocated ${allocated.length} buffers for ${strandCount} strands / ${vertexCount} vertices`);
      return new SimulationStateStore(backend, vertexCount, strandCount, handles);
    } catch (err) {
      for (const buffer of allocated) {
        backend.destroyBuffer(buffer);
      }
      console.error('[StateStore] Allocation failed, released', allocated.length, 'buffers');
      throw err;
    }
  }

  get destroyed(): boolean {
    return this.released;
  }

  /** Reseed both rotation chains with identity. */
  resetRotations(): void {
    const rotations = identityRotations(this.vertexCount);
    this.backend.writeBuffer(this.handles.globalRotations, rotations);
    this.backend.writeBuffer(this.handles.localRotations, rotations);
  }

  /** Release every buffer once; later calls do nothing. */
  destroy(): void {
    if (this.released) return;
    this.released = true;
    for (const buffer of Object.values(this.handles)) {
      this.backend.destroyBuffer(buffer);
    }
  }
}
