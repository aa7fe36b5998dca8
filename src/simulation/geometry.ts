/**
 * Vertex-position buffers (initial, current, previous). In an engine these
 * come from the mesh side; createStrandGeometry stands them up from a rest pose.
 */

import type { ComputeBackend, ComputeBuffer } from '../compute/backend';
import type { StrandGeometry } from '../types/simulation';

/** Allocate the three position buffers, releasing the ones already made if a later one fails. */
export async function createStrandGeometry(
  backend: ComputeBackend,
  restPose: Float32Array,
  strandCount: number
): Promise<StrandGeometry> {
  if (restPose.length % 3 !== 0) {
    throw new RangeError(`rest pose must hold 3 floats per vertex, got ${restPose.length} floats`);
  }
  const allocated: ComputeBuffer[] = [];
  const allocate = (label: string) => {
    const buffer = backend.createBuffer(label, restPose.byteLength, 'storage', restPose);
    allocated.push(buffer);
    return buffer;
  };

  try {
    const geometry: StrandGeometry = {
      vertexCount: restPose.length / 3,
      strandCount,
      initialPositions: allocate('initialPositions'),
      positions: allocate('positions'),
      previousPositions: allocate('previousPositions'),
      restPose: Float32Array.from(restPose),
    };
    await backend.flushAllocations();
    return geometry;
  } catch (err) {
    for (const buffer of allocated) {
      backend.destroyBuffer(buffer);
    }
    throw err;
  }
}

/** Write the rest pose back into current and previous positions. */
export function resetStrandGeometry(backend: ComputeBackend, geometry: StrandGeometry): void {
  backend.writeBuffer(geometry.positions, geometry.restPose);
  backend.writeBuffer(geometry.previousPositions, geometry.restPose);
}

export function destroyStrandGeometry(backend: ComputeBackend, geometry: StrandGeometry): void {
  backend.destroyBuffer(geometry.initialPositions);
  backend.destroyBuffer(geometry.positions);
  backend.destroyBuffer(geometry.previousPositions);
}
