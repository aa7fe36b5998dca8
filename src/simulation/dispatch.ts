/**
 * Workgroup sizing. Host-side group counts and the kernels' thread mapping
 * live together here because they must agree: a group count that rounds down
 * where the kernel expects it to round up drops the last strands silently.
 */

import type { KernelName } from './kernels';

export const WORKGROUP_SIZE = 64;
/** Two strands share a 64-thread group in the vertex-parallel kernels. */
export const MAX_VERTICES_PER_STRAND = 32;
export const STRANDS_PER_VERTEX_GROUP = WORKGROUP_SIZE / MAX_VERTICES_PER_STRAND;
/** WebGPU's default maxComputeWorkgroupsPerDimension. */
export const MAX_WORKGROUPS_PER_DIMENSION = 65535;

/**
 * - `strand-vertices`: one thread per vertex, STRANDS_PER_VERTEX_GROUP strands per group
 * - `strands`: one thread per strand, walking its vertices in order
 * - `vertices`: one thread per vertex of the flat buffer
 */
export type DispatchDomain = 'strand-vertices' | 'strands' | 'vertices';

export const KERNEL_DOMAINS: Readonly<Record<KernelName, DispatchDomain>> = {
  IntegrationAndGlobalShapeConstraints: 'strand-vertices',
  LocalShapeConstraints: 'strands',
  LengthConstraintsAndWind: 'strand-vertices',
  CollisionAndTangents: 'strand-vertices',
  SkipSimulateHair: 'vertices',
};

export interface TopologyCounts {
  strandCount: number;
  vertexCount: number;
}

/**
 * Groups needed to cover `items` with `perGroup` items each: the integer floor
 * of (items + perGroup - 1) / perGroup. Zero items need zero groups.
 */
export function workgroupCount(items: number, perGroup: number): number {
  if (items <= 0) return 0;
  return Math.floor((items + perGroup - 1) / perGroup);
}

export function workgroupsForKernel(kernel: KernelName, counts: TopologyCounts): number {
  switch (KERNEL_DOMAINS[kernel]) {
    case 'strand-vertices':
      return workgroupCount(counts.strandCount, STRANDS_PER_VERTEX_GROUP);
    case 'strands':
      return workgroupCount(counts.strandCount, WORKGROUP_SIZE);
    case 'vertices':
      return workgroupCount(counts.vertexCount, WORKGROUP_SIZE);
  }
}

/**
 * Split a linear group count into an (x, y) grid that respects the
 * per-dimension limit. Kernels rebuild the linear index as y * gridX + x and
 * discard the overhang through their bounds checks.
 */
export function workgroupGrid(groups: number): [number, number] {
  if (groups <= MAX_WORKGROUPS_PER_DIMENSION) return [groups, 1];
  return [MAX_WORKGROUPS_PER_DIMENSION, Math.ceil(groups / MAX_WORKGROUPS_PER_DIMENSION)];
}

export interface ThreadAssignment {
  /** Strand index (strand domains) or vertex index (vertex domain). */
  item: number;
  /** Vertex slot within the strand for `strand-vertices`, otherwise 0. */
  slot: number;
}

/**
 * What a given invocation works on. Mirrors the index math in hairSimulation.wgsl.
 */
export function assignThread(domain: DispatchDomain, group: number, localIndex: number): ThreadAssignment {
  switch (domain) {
    case 'strand-vertices':
      return {
        item: group * STRANDS_PER_VERTEX_GROUP + Math.floor(localIndex / MAX_VERTICES_PER_STRAND),
        slot: localIndex % MAX_VERTICES_PER_STRAND,
      };
    case 'strands':
    case 'vertices':
      return { item: group * WORKGROUP_SIZE + localIndex, slot: 0 };
  }
}
