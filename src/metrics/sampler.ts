// Import host name lookup
import { hostname } from 'node:os';
// Import the event loop delay histogram
import { monitorEventLoopDelay } from 'node:perf_hooks';
import type { IntervalHistogram } from 'node:perf_hooks';
// Import snapshot types
import type { ProcessSnapshot } from './types.js';

// Histogram values are in nanoseconds
const NANOS_PER_MILLI = 1e6;

// Sampling resolution of the event loop delay histogram, in milliseconds
const EVENT_LOOP_RESOLUTION_MS = 20;

// Collects process health metrics, each sample covering the time since the previous one
export class ProcessSampler {
  // Histogram tracking event loop delay between samples
  private readonly histogram: IntervalHistogram;
  // CPU usage at the previous sample, used to compute deltas
  private lastCpu: NodeJS.CpuUsage;
  // Host name reported with every sample
  private readonly host: string;

  constructor(host: string = hostname()) {
    this.host = host;
    this.histogram = monitorEventLoopDelay({ resolution: EVENT_LOOP_RESOLUTION_MS });
    this.lastCpu = process.cpuUsage();
  }

  // Start recording event loop delay
  start(): void {
    this.histogram.enable();
  }

  // Stop recording event loop delay
  stop(): void {
    this.histogram.disable();
  }

  // Take a sample and reset the interval counters
  sample(): ProcessSnapshot {
    // CPU time since the previous sample
    const cpu = process.cpuUsage(this.lastCpu);
    this.lastCpu = process.cpuUsage();

    // Current memory usage
    const memory = process.memoryUsage();

    const snapshot: ProcessSnapshot = {
      hostname: this.host,
      memory: {
        rss: memory.rss,
        heapTotal: memory.heapTotal,
        heapUsed: memory.heapUsed,
        external: memory.external,
        arrayBuffers: memory.arrayBuffers,
      },
      cpu: { user: cpu.user, system: cpu.system },
      uptime: process.uptime(),
    };

    // Only report event loop delay when the histogram recorded something
    if (this.histogram.count > 0) {
      snapshot.eventLoop = {
        min: this.histogram.min / NANOS_PER_MILLI,
        max: this.histogram.max / NANOS_PER_MILLI,
        mean: this.histogram.mean / NANOS_PER_MILLI,
        p99: this.histogram.percentile(99) / NANOS_PER_MILLI,
      };
    }
    this.histogram.reset();

    return snapshot;
  }
}
