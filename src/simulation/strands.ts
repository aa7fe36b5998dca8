/**
 * Strand topology: offset-table validation, strand ranges, and derivation of
 * the per-vertex simulation inputs (rest lengths, reference vectors) from
 * rest-pose polylines. Does not touch any backend.
 */

import type { CapsuleCollider, HairAsset } from '../types/simulation';
import { vec3Distance, vec3Normalize, vec3Subtract, type Vec3 } from '../math/vecmath';
import { MAX_VERTICES_PER_STRAND } from './dispatch';
import { InvalidHairAssetError } from './errors';

export interface StrandRange {
  strand: number;
  /** First vertex (inclusive). */
  start: number;
  /** One past the last vertex. */
  end: number;
}

/**
 * Problems with an offset table, empty when it partitions [0, vertexCount)
 * into non-empty contiguous strands of at most MAX_VERTICES_PER_STRAND vertices.
 */
export function offsetTableProblems(offsets: ArrayLike<number>, vertexCount: number): string[] {
  const problems: string[] = [];
  if (offsets.length === 0) {
    if (vertexCount !== 0) {
      problems.push(`no strands but ${vertexCount} vertices`);
    }
    return problems;
  }
  if (offsets[0] !== 0) {
    problems.push(`vertexOffsets[0] must be 0, got ${offsets[0]}`);
  }
  for (let i = 0; i < offsets.length; i++) {
    const start = offsets[i];
    const end = i + 1 < offsets.length ? offsets[i + 1] : vertexCount;
    if (end <= start) {
      problems.push(`strand ${i} is empty or out of order (${start}..${end})`);
    } else if (end - start > MAX_VERTICES_PER_STRAND) {
      problems.push(`strand ${i} has ${end - start} vertices (max ${MAX_VERTICES_PER_STRAND})`);
    }
  }
  return problems;
}

export function strandRanges(offsets: ArrayLike<number>, vertexCount: number): StrandRange[] {
  const ranges: StrandRange[] = [];
  for (let i = 0; i < offsets.length; i++) {
    ranges.push({
      strand: i,
      start: offsets[i],
      end: i + 1 < offsets.length ? offsets[i + 1] : vertexCount,
    });
  }
  return ranges;
}

/** Vertices per strand when every strand has the same length, else null. */
export function uniformVerticesPerStrand(offsets: ArrayLike<number>, vertexCount: number): number | null {
  if (offsets.length === 0) return null;
  const ranges = strandRanges(offsets, vertexCount);
  const first = ranges[0].end - ranges[0].start;
  return ranges.every((r) => r.end - r.start === first) ? first : null;
}

/**
 * Check array sizes against the declared counts. Throws InvalidHairAssetError.
 */
export function validateHairAsset(asset: HairAsset): HairAsset {
  const { vertexCount, strandCount } = asset;
  const problems: string[] = [];
  if (!Number.isInteger(vertexCount) || vertexCount < 0) {
    problems.push(`vertexCount must be a non-negative integer, got ${vertexCount}`);
  }
  if (!Number.isInteger(strandCount) || strandCount < 0) {
    problems.push(`strandCount must be a non-negative integer, got ${strandCount}`);
  }
  if (asset.restLengths.length !== vertexCount) {
    problems.push(`restLengths has ${asset.restLengths.length} entries, expected ${vertexCount}`);
  }
  if (asset.referenceVectors.length !== vertexCount * 3) {
    problems.push(
      `referenceVectors has ${asset.referenceVectors.length} floats, expected ${vertexCount * 3}`
    );
  }
  if (asset.vertexOffsets.length !== strandCount) {
    problems.push(`vertexOffsets has ${asset.vertexOffsets.length} entries, expected ${strandCount}`);
  } else {
    problems.push(...offsetTableProblems(asset.vertexOffsets, vertexCount));
  }
  if (!(asset.headCollider.radius >= 0)) {
    problems.push(`headCollider.radius must be >= 0, got ${asset.headCollider.radius}`);
  }
  if (problems.length > 0) {
    throw new InvalidHairAssetError(problems);
  }
  return asset;
}

export interface BuiltHair {
  asset: HairAsset;
  /** Rest pose, 3 floats per vertex, in model space. */
  restPose: Float32Array;
}

const FAR_AWAY_COLLIDER: CapsuleCollider = { p0: [0, -1e4, 0], p1: [0, -1e4, 0], radius: 0 };

/**
 * Derive the simulation inputs from rest-pose polylines (root first).
 *
 * Reference vectors are the rest edges expressed in the frame carried along the
 * strand; at rest every frame equals the root frame (identity), so each entry is
 * the edge from the previous vertex. The root's entry is zero.
 */
export function buildHairAsset(
  strands: readonly (readonly Vec3[])[],
  headCollider: CapsuleCollider = FAR_AWAY_COLLIDER
): BuiltHair {
  const vertexCount = strands.reduce((sum, s) => sum + s.length, 0);
  const restPose = new Float32Array(vertexCount * 3);
  const restLengths = new Float32Array(vertexCount);
  const referenceVectors = new Float32Array(vertexCount * 3);
  const vertexOffsets = new Uint32Array(strands.length);

  let v = 0;
  strands.forEach((strand, s) => {
    vertexOffsets[s] = v;
    strand.forEach((p, k) => {
      restPose.set(p, (v + k) * 3);
      const next = strand[k + 1];
      restLengths[v + k] = next ? vec3Distance(p, next) : 0;
      if (k > 0) {
        referenceVectors.set(vec3Subtract(p, strand[k - 1]), (v + k) * 3);
      }
    });
    v += strand.length;
  });

  const asset = validateHairAsset({
    vertexCount,
    strandCount: strands.length,
    restLengths,
    referenceVectors,
    vertexOffsets,
    headCollider,
  });
  return { asset, restPose };
}

export interface StraightStrandOptions {
  strandCount: number;
  verticesPerStrand: number;
  segmentLength: number;
  /** Growth direction of every strand (normalized internally). */
  direction?: Vec3;
  /** Root spacing on the XZ grid. */
  spacing?: number;
}

/**
 * Straight strands rooted on a square XZ grid. Handy for demos and tests.
 */
export function buildStraightStrands(options: StraightStrandOptions): Vec3[][] {
  const { strandCount, verticesPerStrand, segmentLength } = options;
  const dir = vec3Normalize(options.direction ?? [0, -1, 0]);
  const spacing = options.spacing ?? segmentLength;
  const cols = Math.max(1, Math.ceil(Math.sqrt(strandCount)));

  const strands: Vec3[][] = [];
  for (let s = 0; s < strandCount; s++) {
    const root: Vec3 = [(s % cols) * spacing, 0, Math.floor(s / cols) * spacing];
    const strand: Vec3[] = [];
    for (let k = 0; k < verticesPerStrand; k++) {
      strand.push([
        root[0] + dir[0] * segmentLength * k,
        root[1] + dir[1] * segmentLength * k,
        root[2] + dir[2] * segmentLength * k,
      ]);
    }
    strands.push(strand);
  }
  return strands;
}
