/**
 * Fatal initialization errors. None of these are retried: the owning
 * HairSimulation disables itself and keeps the error for inspection.
 */

/** A required collaborator (strand geometry, device) was not supplied. */
export class MissingDependencyError extends Error {
  constructor(readonly dependency: string, detail?: string) {
    super(`Missing dependency: ${dependency}${detail ? ` (${detail})` : ''}`);
    this.name = 'MissingDependencyError';
  }
}

/** The compiled program has no entry point with the requested name. */
export class KernelNotFoundError extends Error {
  constructor(readonly kernel: string, readonly available: readonly string[]) {
    super(`Kernel "${kernel}" not found; program exposes [${available.join(', ')}]`);
    this.name = 'KernelNotFoundError';
  }
}

/** The backend could not allocate a buffer. */
export class AllocationError extends Error {
  constructor(readonly label: string, readonly byteLength: number, options?: { cause?: unknown }) {
    super(`Failed to allocate buffer "${label}" (${byteLength} bytes)`, options);
    this.name = 'AllocationError';
  }
}

/** Host arrays disagree with the declared counts or the offset table is not a partition. */
export class InvalidHairAssetError extends Error {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid hair asset: ${problems.join('; ')}`);
    this.name = 'InvalidHairAssetError';
  }
}

/** The GPU device reported an error for submitted work, or was lost. */
export class DeviceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceError';
  }
}
