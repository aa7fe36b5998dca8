export * from './math/vecmath';
export * from './simulation/errors';
export * from './simulation/params';
export * from './simulation/kernels';
export * from './simulation/bindings';
export * from './simulation/dispatch';
export * from './simulation/strands';
export * from './simulation/uniforms';
export * from './simulation/stateStore';
export * from './simulation/geometry';
export * from './simulation/compute';
export * from './simulation/hairSimulation';
export * from './collision/capsule';
export type * from './types/simulation';
export type * from './compute/backend';
export { CpuBackend, CpuBuffer, type CpuBackendOptions } from './compute/cpuBackend';
export { CPU_KERNELS, type CpuKernel, type CpuKernelEnv } from './compute/cpuKernels';
export { createWebGpuBackend, WebGpuBackend, GpuComputeBuffer, type WebGpuBackendOptions } from './webgpu/webgpuBackend';
export {
  requestComputeDevice,
  type ComputeDeviceContext,
  type ComputeDevice,
  type DeviceBuffer,
  type DeviceCommandEncoder,
  type DeviceComputePass,
  type DeviceErrorFilter,
  type DeviceLostInfo,
  type GpuObject,
} from './webgpu/device';
