/**
 * Device abstraction the orchestrator drives. Two implementations:
 * WebGpuBackend (WGSL pipelines on a GPUDevice) and CpuBackend (the same
 * kernels executed in-process with the same workgroup mapping).
 *
 * Dispatches issued between beginFrame() and endFrame() execute in issue
 * order, each observing every write of the ones before it. Device errors are
 * reported asynchronously: flushAllocations() and endFrame() reject with them.
 */

import type { KernelHandle } from '../simulation/kernels';
import type { KernelBindings } from '../simulation/bindings';

export type BackendKind = 'gpu' | 'cpu';

export type BufferUsage = 'storage' | 'uniform';

export interface ComputeBuffer {
  readonly label: string;
  /** Requested size; the device allocation may be padded. */
  readonly byteLength: number;
  readonly usage: BufferUsage;
}

export type BufferData = Float32Array | Uint32Array | ArrayBuffer;

export interface ComputeBackend {
  readonly kind: BackendKind;
  /** Compute entry points of the loaded program, in source order. */
  readonly entryPoints: readonly string[];

  /** Throws AllocationError when the request is rejected up front. */
  createBuffer(label: string, byteLength: number, usage: BufferUsage, data?: BufferData): ComputeBuffer;
  /**
   * Resolves once every buffer created since the last flush is known to be
   * backed by memory; rejects with AllocationError for the first one that is not.
   */
  flushAllocations(): Promise<void>;
  writeBuffer(buffer: ComputeBuffer, data: BufferData): void;
  destroyBuffer(buffer: ComputeBuffer): void;

  beginFrame(): void;
  dispatch(kernel: KernelHandle, bindings: KernelBindings<ComputeBuffer>, workgroups: number): void;
  /** Submit the frame. Rejects with DeviceError if the device failed it or was lost. */
  endFrame(): Promise<void>;

  /** Copy a buffer back to host memory; waits for all submitted work. */
  readBuffer(buffer: ComputeBuffer, target: Float32Array): Promise<Float32Array>;
}
