/**
 * In-process GPU device for WebGPU backend tests. Records every call, keeps
 * buffer contents in host memory so readback works, and reports errors
 * through error scopes the way a real device does.
 */

import type {
  ComputeDevice,
  DeviceBuffer,
  DeviceCommandEncoder,
  DeviceComputePass,
  DeviceErrorFilter,
  DeviceLostInfo,
  GpuObject,
} from '../src/webgpu/device';

export type GpuCall =
  | { op: 'createBuffer'; label: string; size: number; usage: number }
  | { op: 'writeBuffer'; label: string; byteLength: number }
  | { op: 'destroyBuffer'; label: string }
  | { op: 'beginComputePass'; label: string }
  | { op: 'setPipeline'; label: string }
  | { op: 'setBindGroup'; label: string }
  | { op: 'dispatchWorkgroups'; x: number; y: number; z: number }
  | { op: 'endPass' }
  | { op: 'copyBufferToBuffer'; source: string; destination: string; size: number }
  | { op: 'submit'; commandBuffers: number };

export interface RecordedBindGroup {
  label: string;
  layout: string;
  entries: { binding: number; buffer: string }[];
}

export interface RecordedLayoutEntry {
  binding: number;
  type: string | undefined;
}

class FakeObject implements GpuObject {
  constructor(readonly label: string) {}
}

export class FakeGpuBuffer implements DeviceBuffer {
  readonly bytes: Uint8Array;
  destroyed = false;

  constructor(
    private readonly device: FakeGpuDevice,
    readonly label: string,
    readonly size: number,
    readonly usage: number
  ) {
    this.bytes = new Uint8Array(size);
  }

  async mapAsync(): Promise<void> {}

  getMappedRange(offset = 0, size = this.size - offset): ArrayBuffer {
    const range = new ArrayBuffer(size);
    new Uint8Array(range).set(this.bytes.subarray(offset, offset + size));
    return range;
  }

  unmap(): void {}

  destroy(): void {
    this.destroyed = true;
    this.device.record({ op: 'destroyBuffer', label: this.label });
  }
}

class FakeCommandBuffer extends FakeObject {
  constructor(readonly copies: readonly (() => void)[]) {
    super('');
  }
}

class FakeCommandEncoder implements DeviceCommandEncoder {
  private readonly copies: (() => void)[] = [];

  constructor(private readonly device: FakeGpuDevice) {}

  beginComputePass(descriptor?: { label?: string }): DeviceComputePass {
    const device = this.device;
    device.record({ op: 'beginComputePass', label: descriptor?.label ?? '' });
    return {
      setPipeline: (pipeline) => device.record({ op: 'setPipeline', label: pipeline.label }),
      setBindGroup: (_index, bindGroup) => device.record({ op: 'setBindGroup', label: bindGroup?.label ?? '' }),
      dispatchWorkgroups: (x, y = 1, z = 1) => device.record({ op: 'dispatchWorkgroups', x, y, z }),
      end: () => device.record({ op: 'endPass' }),
    };
  }

  copyBufferToBuffer(
    source: DeviceBuffer,
    sourceOffset: number,
    destination: DeviceBuffer,
    destinationOffset: number,
    size: number
  ): void {
    this.device.record({ op: 'copyBufferToBuffer', source: source.label, destination: destination.label, size });
    if (source instanceof FakeGpuBuffer && destination instanceof FakeGpuBuffer) {
      this.copies.push(() =>
        destination.bytes.set(source.bytes.subarray(sourceOffset, sourceOffset + size), destinationOffset)
      );
    }
  }

  finish(): GpuObject {
    return new FakeCommandBuffer(this.copies);
  }
}

function boundBufferLabel(resource: object): string {
  if ('buffer' in resource && resource.buffer instanceof FakeGpuBuffer) {
    return resource.buffer.label;
  }
  throw new Error('expected a buffer binding');
}

export class FakeGpuDevice implements ComputeDevice {
  readonly calls: GpuCall[] = [];
  readonly bindGroups: RecordedBindGroup[] = [];
  readonly layouts = new Map<string, RecordedLayoutEntry[]>();
  readonly limits = { maxBufferSize: 256 * 1024 * 1024 };
  readonly lost: Promise<DeviceLostInfo>;
  /** Labels whose createBuffer reports out-of-memory. */
  readonly outOfMemory = new Set<string>();
  /** When set, every createBindGroup reports a validation error. */
  invalidBindGroups = false;
  /** Errors raised outside any matching scope. */
  readonly uncaptured: string[] = [];

  readonly queue = {
    writeBuffer: (buffer: DeviceBuffer, offset: number, data: ArrayBuffer): void => {
      this.record({ op: 'writeBuffer', label: buffer.label, byteLength: data.byteLength });
      if (buffer instanceof FakeGpuBuffer) {
        buffer.bytes.set(new Uint8Array(data), offset);
      }
    },
    submit: (commandBuffers: Iterable<GpuObject>): void => {
      const submitted = Array.from(commandBuffers);
      this.record({ op: 'submit', commandBuffers: submitted.length });
      for (const commandBuffer of submitted) {
        if (commandBuffer instanceof FakeCommandBuffer) {
          for (const copy of commandBuffer.copies) copy();
        }
      }
    },
  };

  private readonly scopes: { filter: DeviceErrorFilter; error: { message: string } | null }[] = [];
  private resolveLost: (info: DeviceLostInfo) => void = () => undefined;

  constructor() {
    this.lost = new Promise((resolve) => {
      this.resolveLost = resolve;
    });
  }

  record(call: GpuCall): void {
    this.calls.push(call);
  }

  ops(): string[] {
    return this.calls.map((call) => (call.op === 'beginComputePass' ? `pass:${call.label}` : call.op));
  }

  lose(message: string): void {
    this.resolveLost({ reason: 'unknown', message });
  }

  createBuffer(descriptor: GPUBufferDescriptor): DeviceBuffer {
    const label = descriptor.label ?? '';
    this.record({ op: 'createBuffer', label, size: descriptor.size, usage: descriptor.usage });
    if (this.outOfMemory.has(label)) {
      this.report('out-of-memory', `out of memory allocating ${label}`);
    }
    return new FakeGpuBuffer(this, label, descriptor.size, descriptor.usage);
  }

  createCommandEncoder(): DeviceCommandEncoder {
    return new FakeCommandEncoder(this);
  }

  createShaderModule(descriptor: GPUShaderModuleDescriptor): GpuObject {
    return new FakeObject(descriptor.label ?? '');
  }

  createBindGroupLayout(descriptor: GPUBindGroupLayoutDescriptor): GpuObject {
    const label = descriptor.label ?? '';
    this.layouts.set(
      label,
      Array.from(descriptor.entries, (entry) => ({ binding: entry.binding, type: entry.buffer?.type }))
    );
    return new FakeObject(label);
  }

  createPipelineLayout(descriptor: { label?: string }): GpuObject {
    return new FakeObject(descriptor.label ?? '');
  }

  async createComputePipelineAsync(descriptor: { label?: string }): Promise<GpuObject> {
    return new FakeObject(descriptor.label ?? '');
  }

  createBindGroup(descriptor: {
    label?: string;
    layout: GpuObject;
    entries: Iterable<{ binding: number; resource: object }>;
  }): GpuObject {
    const label = descriptor.label ?? '';
    this.bindGroups.push({
      label,
      layout: descriptor.layout.label,
      entries: Array.from(descriptor.entries, ({ binding, resource }) => ({ binding, buffer: boundBufferLabel(resource) })),
    });
    if (this.invalidBindGroups) {
      this.report('validation', `invalid bind group ${label}`);
    }
    return new FakeObject(label);
  }

  pushErrorScope(filter: DeviceErrorFilter): void {
    this.scopes.push({ filter, error: null });
  }

  async popErrorScope(): Promise<{ readonly message: string } | null> {
    const scope = this.scopes.pop();
    if (!scope) {
      throw new Error('error scope stack is empty');
    }
    return scope.error;
  }

  /** Deliver an error to the innermost scope with a matching filter; the first error wins. */
  private report(filter: DeviceErrorFilter, message: string): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope.filter === filter) {
        scope.error ??= { message };
        return;
      }
    }
    this.uncaptured.push(message);
  }
}
