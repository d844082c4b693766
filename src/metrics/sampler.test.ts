// Tests for the process metrics sampler
import { describe, it, expect, afterEach } from 'vitest';
import { ProcessSampler } from './sampler.js';

describe('ProcessSampler', () => {
  let sampler: ProcessSampler | undefined;

  // Always stop the histogram
  afterEach(() => {
    sampler?.stop();
    sampler = undefined;
  });

  it('reports the configured host name', () => {
    sampler = new ProcessSampler('worker-1');

    expect(sampler.sample().hostname).toBe('worker-1');
  });

  it('reports current memory usage', () => {
    sampler = new ProcessSampler('worker-1');

    const { memory } = sampler.sample();

    expect(memory.rss).toBeGreaterThan(0);
    expect(memory.heapUsed).toBeGreaterThan(0);
    expect(memory.heapTotal).toBeGreaterThanOrEqual(memory.heapUsed);
  });

  it('reports cpu time as integer microseconds since the previous sample', () => {
    sampler = new ProcessSampler('worker-1');

    const { cpu } = sampler.sample();

    expect(Number.isSafeInteger(cpu.user)).toBe(true);
    expect(Number.isSafeInteger(cpu.system)).toBe(true);
    expect(cpu.user).toBeGreaterThanOrEqual(0);
    expect(cpu.system).toBeGreaterThanOrEqual(0);
  });

  it('reports uptime in seconds', () => {
    sampler = new ProcessSampler('worker-1');

    expect(sampler.sample().uptime).toBeGreaterThan(0);
  });

  it('omits event loop delay before the histogram is started', () => {
    sampler = new ProcessSampler('worker-1');

    expect(sampler.sample().eventLoop).toBeUndefined();
  });

  it('reports event loop delay in milliseconds once started', async () => {
    sampler = new ProcessSampler('worker-1');
    sampler.start();

    // Let the histogram record a few samples
    await new Promise((resolve) => setTimeout(resolve, 100));
    const { eventLoop } = sampler.sample();

    expect(eventLoop).toBeDefined();
    expect(eventLoop?.max).toBeGreaterThanOrEqual(eventLoop?.min ?? 0);
    // Histogram counters are reset after each sample
    expect(sampler.sample().eventLoop).toBeUndefined();
  });
});
