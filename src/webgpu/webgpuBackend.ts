/**
 * WebGPU implementation of ComputeBackend. One compute pipeline per entry
 * point of hairSimulation.wgsl, each with an explicit bind group layout built
 * from KERNEL_LAYOUTS. Every dispatch gets its own compute pass so the next
 * stage observes its storage writes.
 *
 * Allocation and frame errors surface through error scopes: each createBuffer
 * runs in an out-of-memory scope checked by flushAllocations(), and each frame
 * runs in validation and out-of-memory scopes checked by endFrame().
 */

import type { BufferData, BufferUsage, ComputeBackend, ComputeBuffer } from '../compute/backend';
import { KERNEL_NAMES, parseComputeEntryPoints, type KernelHandle, type KernelName } from '../simulation/kernels';
import { BINDING_SLOTS, KERNEL_LAYOUTS, type KernelBindings } from '../simulation/bindings';
import { workgroupGrid } from '../simulation/dispatch';
import { AllocationError, DeviceError } from '../simulation/errors';
import {
  createStorageBuffer,
  createUniformBuffer,
  readBackBuffer,
  SHADER_STAGE_COMPUTE,
  toArrayBuffer,
} from './buffers';
import type { ComputeDevice, DeviceBuffer, DeviceCommandEncoder, DeviceLostInfo, GpuObject } from './device';
import hairSimulationWgsl from '../simulation/hairSimulation.wgsl?raw';

export class GpuComputeBuffer implements ComputeBuffer {
  destroyed = false;

  constructor(
    readonly label: string,
    readonly byteLength: number,
    readonly usage: BufferUsage,
    readonly gpuBuffer: DeviceBuffer
  ) {}
}

interface KernelPipeline {
  pipeline: GpuObject;
  layout: GpuObject;
}

interface PendingAllocation {
  label: string;
  byteLength: number;
  error: Promise<{ readonly message: string } | null>;
}

export interface WebGpuBackendOptions {
  /** WGSL program; defaults to the bundled hairSimulation.wgsl. */
  source?: string;
}

export class WebGpuBackend implements ComputeBackend {
  readonly kind = 'gpu' as const;
  private encoder: DeviceCommandEncoder | null = null;
  private pending: PendingAllocation[] = [];
  private lostInfo: DeviceLostInfo | null = null;

  constructor(
    private readonly device: ComputeDevice,
    readonly entryPoints: readonly string[],
    private readonly pipelines: ReadonlyMap<KernelName, KernelPipeline>
  ) {
    device.lost
      .then((info) => {
        this.lostInfo = info;
      })
      .catch((err: unknown) => console.error('[WebGPU] lost handler failed', err));
  }

  get lost(): boolean {
    return this.lostInfo !== null;
  }

  createBuffer(label: string, byteLength: number, usage: BufferUsage, data?: BufferData): GpuComputeBuffer {
    this.assertAlive();
    const limit = this.device.limits.maxBufferSize;
    if (!Number.isInteger(byteLength) || byteLength < 0 || byteLength > limit) {
      throw new AllocationError(label, byteLength);
    }
    this.device.pushErrorScope('out-of-memory');
    try {
      const gpuBuffer =
        usage === 'uniform'
          ? createUniformBuffer(this.device, label, byteLength, data)
          : createStorageBuffer(this.device, label, byteLength, data);
      return new GpuComputeBuffer(label, byteLength, usage, gpuBuffer);
    } catch (err) {
      throw new AllocationError(label, byteLength, { cause: err });
    } finally {
      this.pending.push({ label, byteLength, error: this.device.popErrorScope() });
    }
  }

  async flushAllocations(): Promise<void> {
    const pending = this.pending;
    this.pending = [];
    const errors = await Promise.all(pending.map((allocation) => allocation.error));
    const index = errors.findIndex((error) => error !== null);
    if (index >= 0) {
      const { label, byteLength } = pending[index];
      throw new AllocationError(label, byteLength, { cause: errors[index] });
    }
    this.assertAlive();
  }

  writeBuffer(buffer: ComputeBuffer, data: BufferData): void {
    const target = this.unwrap(buffer);
    if (data.byteLength > target.gpuBuffer.size) {
      throw new RangeError(`write of ${data.byteLength} bytes overflows "${target.label}" (${target.byteLength})`);
    }
    this.device.queue.writeBuffer(target.gpuBuffer, 0, toArrayBuffer(data));
  }

  destroyBuffer(buffer: ComputeBuffer): void {
    const target = this.unwrap(buffer);
    target.gpuBuffer.destroy();
    target.destroyed = true;
  }

  beginFrame(): void {
    this.assertAlive();
    this.device.pushErrorScope('out-of-memory');
    this.device.pushErrorScope('validation');
    this.encoder = this.device.createCommandEncoder({ label: 'Hair Simulation Frame' });
  }

  dispatch(kernel: KernelHandle, bindings: KernelBindings<ComputeBuffer>, workgroups: number): void {
    if (!this.encoder) {
      throw new Error(`[WebGPU] dispatch of ${kernel.name} outside beginFrame/endFrame`);
    }
    const compiled = this.pipelines.get(kernel.name);
    if (!compiled) {
      throw new Error(`[WebGPU] program has no entry point ${kernel.name}`);
    }

    const entries = KERNEL_LAYOUTS[kernel.name].map((name) => {
      const bound = bindings[name];
      if (!bound) {
        throw new Error(`[WebGPU] ${kernel.name}: binding ${name} missing`);
      }
      return { binding: BINDING_SLOTS[name].binding, resource: { buffer: this.unwrap(bound).gpuBuffer } };
    });

    const [x, y] = workgroupGrid(workgroups);
    const pass = this.encoder.beginComputePass({ label: kernel.name });
    pass.setPipeline(compiled.pipeline);
    pass.setBindGroup(
      0,
      this.device.createBindGroup({ label: `${kernel.name} Bind Group`, layout: compiled.layout, entries })
    );
    pass.dispatchWorkgroups(x, y);
    pass.end();
  }

  async endFrame(): Promise<void> {
    const encoder = this.encoder;
    if (!encoder) return;
    this.encoder = null;
    this.device.queue.submit([encoder.finish()]);

    // popped innermost first
    const [validation, outOfMemory] = await Promise.all([this.device.popErrorScope(), this.device.popErrorScope()]);
    const error = validation ?? outOfMemory;
    if (error) {
      throw new DeviceError(`[WebGPU] Frame failed: ${error.message}`, { cause: error });
    }
    this.assertAlive();
  }

  async readBuffer(buffer: ComputeBuffer, target: Float32Array): Promise<Float32Array> {
    this.assertAlive();
    const source = this.unwrap(buffer);
    const size = Math.min(target.byteLength, source.byteLength - (source.byteLength % 4));
    const bytes = await readBackBuffer(this.device, source.gpuBuffer, size);
    target.set(new Float32Array(bytes));
    return target;
  }

  private assertAlive(): void {
    if (this.lostInfo) {
      throw new DeviceError(`[WebGPU] Device lost (${this.lostInfo.reason}): ${this.lostInfo.message}`);
    }
  }

  private unwrap(buffer: ComputeBuffer): GpuComputeBuffer {
    if (!(buffer instanceof GpuComputeBuffer)) {
      throw new TypeError(`buffer "${buffer.label}" was not created by this backend`);
    }
    if (buffer.destroyed) {
      throw new Error(`buffer "${buffer.label}" used after destroy`);
    }
    return buffer;
  }
}

function createKernelLayout(device: ComputeDevice, kernel: KernelName): GpuObject {
  return device.createBindGroupLayout({
    label: `${kernel} Bind Group Layout`,
    entries: KERNEL_LAYOUTS[kernel].map((name) => ({
      binding: BINDING_SLOTS[name].binding,
      visibility: SHADER_STAGE_COMPUTE,
      buffer: { type: BINDING_SLOTS[name].access },
    })),
  });
}

/**
 * Compile the program and build a pipeline for every known kernel it declares.
 * Kernels the program lacks are left out; resolving them later fails.
 */
export async function createWebGpuBackend(
  device: ComputeDevice,
  options: WebGpuBackendOptions = {}
): Promise<WebGpuBackend> {
  const code = options.source ?? hairSimulationWgsl;
  const entryPoints = parseComputeEntryPoints(code);
  const module = device.createShaderModule({ label: 'Hair Simulation Shader', code });

  const kernels = KERNEL_NAMES.filter((name) => entryPoints.includes(name));
  const compiled = await Promise.all(
    kernels.map(async (name): Promise<[KernelName, KernelPipeline]> => {
      const layout = createKernelLayout(device, name);
      const pipeline = await device.createComputePipelineAsync({
        label: `${name} Pipeline`,
        layout: device.createPipelineLayout({ bindGroupLayouts: [layout] }),
        compute: { module, entryPoint: name },
      });
      return [name, { pipeline, layout }];
    })
  );

  console.log(`[WebGPU] Compiled ${compiled.length} kernels: ${kernels.join(', ')}`);
  return new WebGpuBackend(device, entryPoints, new Map(compiled));
}
