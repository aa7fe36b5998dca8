/**
 * Numerical behaviour of the kernels, run through the CPU backend.
 */

import { describe, it, expect } from 'vitest';
import { resetHairSimulation, stepHairSimulation, updateHairParams } from '../src/simulation/compute';
import { withOverrides } from '../src/simulation/params';
import { buildStraightStrands } from '../src/simulation/strands';
import { mat4FromRotationTranslation, quatFromAxisAngle, quatIdentity, type Vec3 } from '../src/math/vecmath';
import { createTestHair, frameAt, readFloats, vertexAt } from './testUtils';

const FROZEN = { integrationAndGlobalShape: true, localShape: false, lengthAndWind: false, collisionAndTangents: false };

function lengthOf(v: readonly number[]): number {
  return Math.hypot(...v);
}

describe('rotations', () => {
  it('start as identity quaternions', async () => {
    const { backend, ctx } = await createTestHair(buildStraightStrands({ strandCount: 2, verticesPerStrand: 3, segmentLength: 1 }));
    const global = await readFloats(backend, ctx.state.handles.globalRotations);
    const local = await readFloats(backend, ctx.state.handles.localRotations);
    expect(Array.from(global)).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1]);
    expect(Array.from(local)).toEqual(Array.from(global));
  });

  it('stay unit length while the hair swings', async () => {
    const { backend, ctx } = await createTestHair(
      buildStraightStrands({ strandCount: 3, verticesPerStrand: 6, segmentLength: 0.1, direction: [1, -1, 0] }),
      withOverrides({ stiffnessForGlobalShapeMatching: 0.1, wind: [4, 0, 1], stages: { lengthAndWind: true } })
    );
    for (let i = 0; i < 10; i++) {
      const angle = i * 0.2;
      const rotation = quatFromAxisAngle([0, 1, 0], angle);
      await stepHairSimulation(ctx, frameAt(1 / 60, mat4FromRotationTranslation(rotation, [0, 0, i * 0.05]), rotation));
    }
    for (const buffer of [ctx.state.handles.globalRotations, ctx.state.handles.localRotations]) {
      const data = await readFloats(backend, buffer);
      for (let v = 0; v < data.length / 4; v++) {
        expect(lengthOf(Array.from(data.subarray(v * 4, v * 4 + 4)))).toBeCloseTo(1, 5);
      }
    }
  });
});

describe('integration and global shape', () => {
  it('leaves a resting strand in place with full stiffness and no motion', async () => {
    const strands = buildStraightStrands({ strandCount: 2, verticesPerStrand: 5, segmentLength: 0.25 });
    const { backend, ctx, hair } = await createTestHair(
      strands,
      withOverrides({ stiffnessForGlobalShapeMatching: 1, damping: 0, gravity: [0, 0, 0] })
    );
    await stepHairSimulation(ctx, frameAt(0));

    const positions = await readFloats(backend, ctx.geometry.positions);
    for (let i = 0; i < positions.length; i++) {
      expect(positions[i]).toBeCloseTo(hair.restPose[i], 6);
    }
  });

  it('free falls in closed form without shape matching', async () => {
    const { backend, ctx, hair } = await createTestHair(
      buildStraightStrands({ strandCount: 1, verticesPerStrand: 3, segmentLength: 1, direction: [1, 0, 0] }),
      withOverrides({
        stiffnessForGlobalShapeMatching: 0,
        damping: 0,
        gravity: [0, -10, 0],
        stages: FROZEN,
      })
    );
    const frames = 5;
    for (let n = 0; n < frames; n++) {
      await stepHairSimulation(ctx, frameAt(0.1));
    }

    // x_N = g dt^2 N (N + 1) / 2
    const expectedDrop = -10 * 0.01 * (frames * (frames + 1)) / 2;
    const positions = await readFloats(backend, ctx.geometry.positions);
    expect(vertexAt(positions, 0)).toEqual([0, 0, 0]);
    for (const v of [1, 2]) {
      const [x, y, z] = vertexAt(positions, v);
      expect(x).toBeCloseTo(hair.restPose[v * 3], 5);
      expect(y).toBeCloseTo(expectedDrop, 4);
      expect(z).toBe(0);
    }
  });

  it('keeps (1 - damping) of the previous frame velocity', async () => {
    const run = async (damping: number) => {
      const { backend, ctx } = await createTestHair(
        buildStraightStrands({ strandCount: 1, verticesPerStrand: 2, segmentLength: 1, direction: [1, 0, 0] }),
        withOverrides({ stiffnessForGlobalShapeMatching: 0, damping, gravity: [0, -10, 0], stages: FROZEN })
      );
      await stepHairSimulation(ctx, frameAt(0.1));
      const current = vertexAt(await readFloats(backend, ctx.geometry.positions), 1);
      const previous = vertexAt(await readFloats(backend, ctx.geometry.previousPositions), 1);
      await stepHairSimulation(ctx, frameAt(0.1));
      return { current, previous, next: vertexAt(await readFloats(backend, ctx.geometry.positions), 1) };
    };

    const damped = await run(0.5);
    expect(damped.previous[1]).toBe(0);
    expect(damped.current[1]).toBeCloseTo(-0.1, 6);
    // next = cur + 0.5 (cur - prev) + g dt^2
    expect(damped.next[1]).toBeCloseTo(damped.current[1] + 0.5 * (damped.current[1] - damped.previous[1]) - 0.1, 6);
    expect(damped.next[1]).toBeCloseTo(-0.25, 5);
    expect(damped.next[0]).toBe(1);

    const undamped = await run(0);
    expect(undamped.next[1]).toBeCloseTo(-0.3, 5);
  });

  it('pins roots to the transformed rest pose', async () => {
    const { backend, ctx } = await createTestHair(
      buildStraightStrands({ strandCount: 1, verticesPerStrand: 2, segmentLength: 1, direction: [1, 0, 0] })
    );
    const rotation = quatFromAxisAngle([0, 0, 1], Math.PI / 2);
    await stepHairSimulation(ctx, frameAt(1 / 60, mat4FromRotationTranslation(rotation, [0, 2, 0]), rotation));

    const positions = await readFloats(backend, ctx.geometry.positions);
    const previous = await readFloats(backend, ctx.geometry.previousPositions);
    expect(Array.from(positions.subarray(0, 3))).toEqual([0, 2, 0]);
    expect(Array.from(previous.subarray(0, 3))).toEqual([0, 2, 0]);
  });
});

describe('four-vertex strand under gravity', () => {
  const strand = () => buildStraightStrands({ strandCount: 1, verticesPerStrand: 4, segmentLength: 1, direction: [1, 0, 0] });
  const restTip: Vec3 = [3, 0, 0];

  async function tipAfterOneFrame(damping: number, stiffness: number, timeStep = 0.1, gravity = -10): Promise<Vec3> {
    const { backend, ctx } = await createTestHair(
      strand(),
      withOverrides({
        damping,
        stiffnessForGlobalShapeMatching: stiffness,
        globalShapeMatchingEffectiveRange: 0.5,
        stiffnessForLocalShapeMatching: 0.5,
        gravity: [0, gravity, 0],
      })
    );
    await stepHairSimulation(ctx, frameAt(timeStep));
    return vertexAt(await readFloats(backend, ctx.geometry.positions), 3);
  }

  const distFromRest = (p: Vec3) => lengthOf([p[0] - restTip[0], p[1] - restTip[1], p[2] - restTip[2]]);

  it('moves the tip less with damping and global stiffness than without', async () => {
    const constrained = await tipAfterOneFrame(0.5, 0.8);
    const free = await tipAfterOneFrame(0, 0);

    expect(constrained[1]).toBeCloseTo(-0.1075, 3);
    expect(free[1]).toBeCloseTo(-0.1125, 3);
    expect(distFromRest(constrained)).toBeLessThan(distFromRest(free));
  });

  it('holds the same ordering for one 60 Hz frame under standard gravity', async () => {
    const constrained = await tipAfterOneFrame(0.5, 0.8, 1 / 60, -9.81);
    const free = await tipAfterOneFrame(0, 0, 1 / 60, -9.81);

    expect(constrained[1]).toBeCloseTo(-0.002929, 5);
    expect(free[1]).toBeCloseTo(-0.003066, 5);
    expect(distFromRest(constrained)).toBeLessThan(distFromRest(free));
  });

  it('reports each vertex correction in the debug buffer', async () => {
    const { ctx } = await createTestHair(
      strand(),
      withOverrides({
        damping: 0,
        stiffnessForGlobalShapeMatching: 0,
        stiffnessForLocalShapeMatching: 0.5,
        gravity: [0, -10, 0],
        diagnostics: { readbackDebugBuffer: true },
      })
    );
    const stats = await stepHairSimulation(ctx, frameAt(0.1));
    const positions = await readFloats(ctx.backend, ctx.geometry.positions);

    expect(stats.debug).not.toBeNull();
    const debug = stats.debug ?? new Float32Array(0);
    expect(debug).toHaveLength(12);
    expect(Array.from(debug.subarray(0, 3))).toEqual([0, 0, 0]);
    expect(debug[4]).toBeCloseTo(0.05, 3);
    // after integration every free vertex sat at y = -0.1
    for (const v of [1, 2, 3]) {
      expect(positions[v * 3 + 1]).toBeCloseTo(-0.1 + debug[v * 3 + 1], 6);
    }
  });
});

describe('length constraints and wind', () => {
  const params = (iterations: number) =>
    withOverrides({
      stiffnessForGlobalShapeMatching: 0,
      damping: 0,
      gravity: [0, 0, 0],
      wind: [50, 0, 0],
      lengthConstraintIterations: iterations,
      stages: { ...FROZEN, lengthAndWind: true },
    });
  const strand = () => buildStraightStrands({ strandCount: 1, verticesPerStrand: 3, segmentLength: 1 });

  it('wind displaces the free vertices by wind * dt^2', async () => {
    const { backend, ctx } = await createTestHair(strand(), params(0));
    await stepHairSimulation(ctx, frameAt(0.1));
    const positions = await readFloats(backend, ctx.geometry.positions);
    expect(positions[0]).toBe(0);
    expect(positions[3]).toBeCloseTo(0.5, 5);
    expect(positions[6]).toBeCloseTo(0.5, 5);
  });

  it('projects every edge back to its rest length', async () => {
    const { backend, ctx } = await createTestHair(strand(), params(30));
    await stepHairSimulation(ctx, frameAt(0.1));
    const positions = await readFloats(backend, ctx.geometry.positions);
    const [p0, p1, p2] = [0, 1, 2].map((v) => vertexAt(positions, v));
    expect(Array.from(p0)).toEqual([0, 0, 0]);
    expect(lengthOf([p1[0] - p0[0], p1[1] - p0[1], p1[2] - p0[2]])).toBeCloseTo(1, 4);
    expect(lengthOf([p2[0] - p1[0], p2[1] - p1[1], p2[2] - p1[2]])).toBeCloseTo(1, 4);
  });
});

describe('collision and tangents', () => {
  const strand = (): Vec3[][] => [
    [
      [0, 1, 0],
      [0, 0.25, 0],
    ],
  ];
  const params = (headCollision: boolean) =>
    withOverrides({
      stiffnessForGlobalShapeMatching: 0,
      damping: 0,
      gravity: [0, 0, 0],
      stages: { localShape: false, headCollision },
    });

  async function run(headCollision: boolean) {
    const { backend, ctx } = await createTestHair(strand(), params(headCollision));
    // capsule along X through the origin, radius 0.5
    backend.writeBuffer(ctx.state.handles.collider, Float32Array.of(-1, 0, 0, 0.5, 1, 0, 0, 0));
    await stepHairSimulation(ctx, frameAt(0));
    return {
      positions: await readFloats(backend, ctx.geometry.positions),
      previous: await readFloats(backend, ctx.geometry.previousPositions),
      tangents: await readFloats(backend, ctx.state.handles.tangents),
    };
  }

  it('pushes a penetrating vertex to the capsule surface', async () => {
    const { positions, previous } = await run(true);
    expect(Array.from(positions.subarray(3, 6))).toEqual([0, 0.5, 0]);
    expect(Array.from(previous.subarray(3, 6))).toEqual([0, 0.25, 0]);
  });

  it('leaves the vertex inside when head collision is off', async () => {
    const { positions } = await run(false);
    expect(Array.from(positions.subarray(3, 6))).toEqual([0, 0.25, 0]);
  });

  it('writes unit tangents along the strand, the tip reusing its incoming edge', async () => {
    const { tangents } = await run(false);
    expect(Array.from(tangents)).toEqual([0, -1, 0, 0, 0, -1, 0, 0]);
  });
});

describe('pause and reset', () => {
  const strands = () => buildStraightStrands({ strandCount: 2, verticesPerStrand: 4, segmentLength: 0.5 });

  it('paused hair snaps to the transformed rest pose', async () => {
    const { backend, ctx, hair } = await createTestHair(strands());
    for (let i = 0; i < 3; i++) await stepHairSimulation(ctx, frameAt(1 / 30));

    updateHairParams(ctx, withOverrides({ paused: true }));
    await stepHairSimulation(ctx, frameAt(1 / 30, mat4FromRotationTranslation(quatIdentity(), [1, 2, 3])));

    const positions = await readFloats(backend, ctx.geometry.positions);
    const previous = await readFloats(backend, ctx.geometry.previousPositions);
    for (let v = 0; v < hair.asset.vertexCount; v++) {
      const rest = vertexAt(hair.restPose, v);
      expect(vertexAt(positions, v)).toEqual([rest[0] + 1, rest[1] + 2, rest[2] + 3]);
      expect(vertexAt(previous, v)).toEqual(vertexAt(positions, v));
    }
  });

  it('reset restores the rest pose and identity rotations', async () => {
    const { backend, ctx, hair } = await createTestHair(strands());
    for (let i = 0; i < 3; i++) await stepHairSimulation(ctx, frameAt(1 / 30));

    resetHairSimulation(ctx);

    expect(Array.from(await readFloats(backend, ctx.geometry.positions))).toEqual(Array.from(hair.restPose));
    expect(Array.from(await readFloats(backend, ctx.geometry.previousPositions))).toEqual(Array.from(hair.restPose));
    const global = await readFloats(backend, ctx.state.handles.globalRotations);
    expect(global[3]).toBe(1);
    expect(global[7]).toBe(1);
    expect(global[4]).toBe(0);
  });
});
