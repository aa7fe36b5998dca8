/**
 * In-process backend: buffers are ArrayBuffers and dispatches run the CPU
 * kernels group by group, in issue order. Binding validation follows the
 * WebGPU rules the GPU path would enforce (every declared binding present,
 * uniform vs storage usage respected).
 */

import type { BufferData, BufferUsage, ComputeBackend, ComputeBuffer } from './backend';
import type { KernelHandle } from '../simulation/kernels';
import { BINDING_SLOTS, KERNEL_LAYOUTS, type BindingName, type KernelBindings } from '../simulation/bindings';
import { unpackHairUniforms } from '../simulation/uniforms';
import { AllocationError } from '../simulation/errors';
import { CPU_KERNELS, type CpuKernelEnv } from './cpuKernels';

/** Same default as WebGPU's maxBufferSize. */
const DEFAULT_MAX_BUFFER_SIZE = 256 * 1024 * 1024;

export class CpuBuffer implements ComputeBuffer {
  readonly bytes: ArrayBuffer;
  destroyed = false;

  constructor(
    readonly label: string,
    readonly byteLength: number,
    readonly usage: BufferUsage
  ) {
    this.bytes = new ArrayBuffer(Math.ceil(byteLength / 4) * 4);
  }

  f32(): Float32Array {
    return new Float32Array(this.bytes);
  }

  u32(): Uint32Array {
    return new Uint32Array(this.bytes);
  }
}

export interface CpuBackendOptions {
  maxBufferSize?: number;
  /** Restrict the entry points the backend reports (e.g. to emulate an older program). */
  entryPoints?: readonly string[];
}

export class CpuBackend implements ComputeBackend {
  readonly kind = 'cpu' as const;
  readonly entryPoints: readonly string[];
  private readonly maxBufferSize: number;
  private inFrame = false;

  constructor(options: CpuBackendOptions = {}) {
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    this.entryPoints = options.entryPoints ?? Object.keys(CPU_KERNELS);
  }

  createBuffer(label: string, byteLength: number, usage: BufferUsage, data?: BufferData): CpuBuffer {
    if (!Number.isInteger(byteLength) || byteLength < 0 || byteLength > this.maxBufferSize) {
      throw new AllocationError(label, byteLength);
    }
    const buffer = new CpuBuffer(label, byteLength, usage);
    if (data) this.writeBuffer(buffer, data);
    return buffer;
  }

  writeBuffer(buffer: ComputeBuffer, data: BufferData): void {
    const target = this.unwrap(buffer);
    const bytes = data instanceof ArrayBuffer ? new Uint8Array(data) : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    if (bytes.byteLength > target.bytes.byteLength) {
      throw new RangeError(`write of ${bytes.byteLength} bytes overflows "${target.label}" (${target.byteLength})`);
    }
    new Uint8Array(target.bytes).set(bytes);
  }

  destroyBuffer(buffer: ComputeBuffer): void {
    this.unwrap(buffer).destroyed = true;
  }

  /** Host allocations either succeed in createBuffer or throw there. */
  async flushAllocations(): Promise<void> {}

  beginFrame(): void {
    this.inFrame = true;
  }

  dispatch(kernel: KernelHandle, bindings: KernelBindings<ComputeBuffer>, workgroups: number): void {
    if (!this.inFrame) {
      throw new Error(`[CpuBackend] dispatch of ${kernel.name} outside beginFrame/endFrame`);
    }
    if (!this.entryPoints.includes(kernel.name)) {
      throw new Error(`[CpuBackend] program has no entry point ${kernel.name}`);
    }
    const env = this.buildEnv(kernel, bindings);
    const run = CPU_KERNELS[kernel.name];
    for (let group = 0; group < workgroups; group++) {
      run(env, group);
    }
  }

  async endFrame(): Promise<void> {
    this.inFrame = false;
  }

  async readBuffer(buffer: ComputeBuffer, target: Float32Array): Promise<Float32Array> {
    const source = this.unwrap(buffer).f32();
    target.set(source.subarray(0, Math.min(source.length, target.length)));
    return target;
  }

  private unwrap(buffer: ComputeBuffer): CpuBuffer {
    if (!(buffer instanceof CpuBuffer)) {
      throw new TypeError(`buffer "${buffer.label}" was not created by this backend`);
    }
    if (buffer.destroyed) {
      throw new Error(`buffer "${buffer.label}" used after destroy`);
    }
    return buffer;
  }

  private buildEnv(kernel: KernelHandle, bindings: KernelBindings<ComputeBuffer>): CpuKernelEnv {
    const resolve = (name: BindingName): CpuBuffer | null => {
      const declared = KERNEL_LAYOUTS[kernel.name].includes(name);
      const bound = bindings[name];
      if (declared && !bound) {
        throw new Error(`[CpuBackend] ${kernel.name}: binding ${name} missing`);
      }
      if (!declared || !bound) return null;
      const buffer = this.unwrap(bound);
      const wantsUniform = BINDING_SLOTS[name].access === 'uniform';
      if (wantsUniform !== (buffer.usage === 'uniform')) {
        throw new Error(`[CpuBackend] ${kernel.name}: ${name} bound with ${buffer.usage} buffer "${buffer.label}"`);
      }
      return buffer;
    };
    const f32 = (name: BindingName): Float32Array => resolve(name)?.f32() ?? new Float32Array(0);

    const params = resolve('params');
    if (!params) {
      throw new Error(`[CpuBackend] ${kernel.name}: params uniform missing`);
    }
    return {
      params: unpackHairUniforms(new DataView(params.bytes)),
      vertexOffsets: resolve('vertexOffsets')?.u32() ?? new Uint32Array(0),
      initialPositions: f32('initialPositions'),
      positions: f32('positions'),
      previousPositions: f32('previousPositions'),
      restLengths: f32('restLengths'),
      globalRotations: f32('globalRotations'),
      localRotations: f32('localRotations'),
      referenceVectors: f32('referenceVectors'),
      tangents: f32('tangents'),
      collider: f32('collider'),
      debug: f32('debug'),
    };
  }
}
