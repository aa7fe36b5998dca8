/**
 * WebGPU device acquisition and lost handling.
 * No simulation logic; only adapter/device creation and lifecycle.
 */

/** Any GPU object: buffers, layouts, pipelines, bind groups, command buffers. */
export interface GpuObject {
  readonly label: string;
}

export interface DeviceBuffer extends GpuObject {
  readonly size: number;
  mapAsync(mode: number): Promise<void>;
  getMappedRange(offset?: number, size?: number): ArrayBuffer;
  unmap(): void;
  destroy(): void;
}

export interface DeviceComputePass {
  setPipeline(pipeline: GpuObject): void;
  setBindGroup(index: number, bindGroup: GpuObject | null | undefined): void;
  dispatchWorkgroups(x: number, y?: number, z?: number): void;
  end(): void;
}

export interface DeviceCommandEncoder {
  beginComputePass(descriptor?: { label?: string }): DeviceComputePass;
  copyBufferToBuffer(
    source: DeviceBuffer,
    sourceOffset: number,
    destination: DeviceBuffer,
    destinationOffset: number,
    size: number
  ): void;
  finish(): GpuObject;
}

export interface DeviceLostInfo {
  readonly reason: string;
  readonly message: string;
}

export type DeviceErrorFilter = 'validation' | 'out-of-memory' | 'internal';

/**
 * The part of GPUDevice the compute backend drives. A GPUDevice satisfies it;
 * so does an in-process stand-in.
 */
export interface ComputeDevice {
  readonly limits: { readonly maxBufferSize: number };
  readonly lost: Promise<DeviceLostInfo>;
  readonly queue: {
    writeBuffer(buffer: DeviceBuffer, offset: number, data: ArrayBuffer): void;
    submit(commandBuffers: Iterable<GpuObject>): void;
  };
  createBuffer(descriptor: GPUBufferDescriptor): DeviceBuffer;
  createCommandEncoder(descriptor?: { label?: string }): DeviceCommandEncoder;
  createShaderModule(descriptor: GPUShaderModuleDescriptor): GpuObject;
  createBindGroupLayout(descriptor: GPUBindGroupLayoutDescriptor): GpuObject;
  createPipelineLayout(descriptor: { label?: string; bindGroupLayouts: Iterable<GpuObject | null> }): GpuObject;
  createComputePipelineAsync(descriptor: {
    label?: string;
    layout: GpuObject | 'auto';
    compute: { module: GpuObject; entryPoint?: string };
  }): Promise<GpuObject>;
  createBindGroup(descriptor: {
    label?: string;
    layout: GpuObject;
    entries: Iterable<{ binding: number; resource: object }>;
  }): GpuObject;
  pushErrorScope(filter: DeviceErrorFilter): void;
  popErrorScope(): Promise<{ readonly message: string } | null>;
}

export interface ComputeDeviceContext {
  adapter: GPUAdapter;
  device: GPUDevice;
}

function defaultGpu(): GPU | undefined {
  return typeof navigator === 'undefined' ? undefined : navigator.gpu;
}

/**
 * Request a WebGPU adapter and device for compute work. Returns null if unavailable.
 * Pass `gpu` explicitly on hosts without `navigator.gpu` (Node WebGPU bindings).
 */
export async function requestComputeDevice(
  gpu: GPU | undefined = defaultGpu(),
  onLost?: (info: GPUDeviceLostInfo) => void
): Promise<ComputeDeviceContext | null> {
  if (!gpu) {
    console.warn('[WebGPU] WebGPU not available');
    return null;
  }
  const adapter = await gpu.requestAdapter({ powerPreference: 'high-performance' });
  if (!adapter) {
    console.warn('[WebGPU] No suitable GPU adapter');
    return null;
  }
  const device = await adapter.requestDevice();
  device.lost
    .then((info) => {
      console.error(`[WebGPU] Device lost (${info.reason}): ${info.message}`);
      onLost?.(info);
    })
    .catch((err: unknown) => console.error('[WebGPU] lost handler failed', err));
  return { adapter, device };
}
