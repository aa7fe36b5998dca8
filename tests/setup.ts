/**
 * Test setup. Tests run on the CPU backend; WebGPU is never requested, but
 * silence the per-initialization logs so failures stay readable.
 */

import { vi } from 'vitest';

vi.spyOn(console, 'log').mockImplementation(() => undefined);
