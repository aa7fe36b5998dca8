/**
 * WebGPU buffer helpers for storage/uniform buffers and readback staging.
 *
 * Usage flags are spelled out numerically so this module loads on hosts that
 * provide a GPUDevice without the GPUBufferUsage globals (Node bindings).
 */

import type { ComputeDevice, DeviceBuffer } from './device';

export const BUFFER_USAGE = {
  MAP_READ: 0x0001,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
} as const;

export const MAP_MODE_READ = 0x0001;
export const SHADER_STAGE_COMPUTE = 0x0004;

/** WebGPU rejects zero-sized bindings; every buffer gets at least this many bytes. */
export const MIN_BUFFER_SIZE = 16;

export function alignedSize(size: number): number {
  return Math.max(MIN_BUFFER_SIZE, Math.ceil(size / 16) * 16);
}

/**
 * Create a GPUBuffer with the given usage and size; optionally initialize from data.
 */
export function createBuffer(
  device: ComputeDevice,
  label: string,
  size: number,
  usage: number,
  data?: ArrayBuffer | ArrayBufferView
): DeviceBuffer {
  const buffer = device.createBuffer({ label, size, usage });
  if (data) {
    device.queue.writeBuffer(buffer, 0, toArrayBuffer(data));
  }
  return buffer;
}

/** Copy the bytes a view covers into a standalone ArrayBuffer. */
export function toArrayBuffer(data: ArrayBuffer | ArrayBufferView): ArrayBuffer {
  if (data instanceof ArrayBuffer) return data;
  const copy = new Uint8Array(data.byteLength);
  copy.set(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
  return copy.buffer;
}

/**
 * Storage buffer, read-only or read-write in the shader. Size aligned to 16 bytes.
 */
export function createStorageBuffer(
  device: ComputeDevice,
  label: string,
  size: number,
  data?: ArrayBuffer | ArrayBufferView
): DeviceBuffer {
  return createBuffer(
    device,
    label,
    alignedSize(size),
    BUFFER_USAGE.STORAGE | BUFFER_USAGE.COPY_DST | BUFFER_USAGE.COPY_SRC,
    data
  );
}

export function createUniformBuffer(
  device: ComputeDevice,
  label: string,
  size: number,
  data?: ArrayBuffer | ArrayBufferView
): DeviceBuffer {
  return createBuffer(device, label, alignedSize(size), BUFFER_USAGE.UNIFORM | BUFFER_USAGE.COPY_DST, data);
}

/**
 * Copy `size` bytes of `source` into a mappable staging buffer and read them back.
 * Waits for all previously submitted work on the queue.
 */
export async function readBackBuffer(device: ComputeDevice, source: DeviceBuffer, size: number): Promise<ArrayBuffer> {
  const staging = device.createBuffer({
    label: `${source.label} (readback)`,
    size: alignedSize(size),
    usage: BUFFER_USAGE.MAP_READ | BUFFER_USAGE.COPY_DST,
  });
  const encoder = device.createCommandEncoder();
  encoder.copyBufferToBuffer(source, 0, staging, 0, alignedSize(size));
  device.queue.submit([encoder.finish()]);

  try {
    await staging.mapAsync(MAP_MODE_READ);
    return staging.getMappedRange(0, alignedSize(size)).slice(0, size);
  } finally {
    staging.unmap();
    staging.destroy();
  }
}
