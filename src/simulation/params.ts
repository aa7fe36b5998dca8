/**
 * Simulation parameters and hair style presets.
 * Maps to the uniform block in hairSimulation.wgsl.
 */

import type { HairSimulationParams, PipelineStages } from '../types/simulation';

/** Stage set that matches the dispatch order the pipeline has always run. */
export const DEFAULT_STAGES: PipelineStages = {
  integrationAndGlobalShape: true,
  localShape: true,
  lengthAndWind: false,
  collisionAndTangents: true,
  headCollision: false,
};

export const DEFAULT_HAIR_PARAMS: HairSimulationParams = {
  stiffnessForGlobalShapeMatching: 0.8,
  globalShapeMatchingEffectiveRange: 0.5,
  stiffnessForLocalShapeMatching: 0.5,
  damping: 0.5,
  gravity: [0, -9.81, 0],
  wind: [0, 0, 0],
  lengthConstraintIterations: 1,
  stages: DEFAULT_STAGES,
  paused: false,
  diagnostics: { readbackDebugBuffer: false },
};

/** Hair style presets (keys are display keys). */
export const HAIR_PRESETS: Record<string, Partial<HairSimulationParams>> = {
  'styles.short': {
    stiffnessForGlobalShapeMatching: 0.9,
    globalShapeMatchingEffectiveRange: 0.8,
    stiffnessForLocalShapeMatching: 0.8,
    damping: 0.6,
  },
  'styles.long': {
    stiffnessForGlobalShapeMatching: 0.4,
    globalShapeMatchingEffectiveRange: 0.3,
    stiffnessForLocalShapeMatching: 0.4,
    damping: 0.3,
  },
  'styles.windswept': {
    stiffnessForGlobalShapeMatching: 0.3,
    globalShapeMatchingEffectiveRange: 0.25,
    damping: 0.2,
    wind: [2.5, 0, 0],
    lengthConstraintIterations: 2,
    stages: { ...DEFAULT_STAGES, lengthAndWind: true },
  },
};

export function getParamsForPreset(presetKey: string): HairSimulationParams {
  const preset = HAIR_PRESETS[presetKey];
  return withOverrides(preset ?? {});
}

/**
 * Merge overrides onto the defaults. Nested stage and diagnostics objects are
 * merged field by field so a partial override keeps the other flags.
 */
export function withOverrides(
  overrides: Partial<Omit<HairSimulationParams, 'stages' | 'diagnostics'>> & {
    stages?: Partial<PipelineStages>;
    diagnostics?: Partial<HairSimulationParams['diagnostics']>;
  }
): HairSimulationParams {
  return {
    ...DEFAULT_HAIR_PARAMS,
    ...overrides,
    gravity: overrides.gravity ?? [...DEFAULT_HAIR_PARAMS.gravity],
    wind: overrides.wind ?? [...DEFAULT_HAIR_PARAMS.wind],
    stages: { ...DEFAULT_STAGES, ...overrides.stages },
    diagnostics: { ...DEFAULT_HAIR_PARAMS.diagnostics, ...overrides.diagnostics },
  };
}

/** Copy with its own vectors and flag objects, sharing nothing with `params`. */
export function cloneParams(params: HairSimulationParams): HairSimulationParams {
  return {
    ...params,
    gravity: [...params.gravity],
    wind: [...params.wind],
    stages: { ...params.stages },
    diagnostics: { ...params.diagnostics },
  };
}

const UNIT_INTERVAL_FIELDS = [
  'stiffnessForGlobalShapeMatching',
  'globalShapeMatchingEffectiveRange',
  'stiffnessForLocalShapeMatching',
  'damping',
] as const;

/**
 * Throws a RangeError naming every invalid field.
 */
export function validateParams(params: HairSimulationParams): HairSimulationParams {
  const problems: string[] = [];
  for (const field of UNIT_INTERVAL_FIELDS) {
    const value = params[field];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${field} must be in [0, 1], got ${value}`);
    }
  }
  if (!params.gravity.every(Number.isFinite)) {
    problems.push(`gravity must be finite, got [${params.gravity.join(', ')}]`);
  }
  if (!params.wind.every(Number.isFinite)) {
    problems.push(`wind must be finite, got [${params.wind.join(', ')}]`);
  }
  if (!Number.isInteger(params.lengthConstraintIterations) || params.lengthConstraintIterations < 0) {
    problems.push(
      `lengthConstraintIterations must be a non-negative integer, got ${params.lengthConstraintIterations}`
    );
  }
  if (problems.length > 0) {
    throw new RangeError(problems.join('; '));
  }
  return params;
}
