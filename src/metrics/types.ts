// Memory usage in bytes, as reported by process.memoryUsage()
export interface MemorySnapshot {
  rss: number;            // Resident set size
  heapTotal: number;      // V8 heap allocated
  heapUsed: number;       // V8 heap in use
  external: number;       // Memory of C++ objects bound to JS objects
  arrayBuffers: number;   // Memory of ArrayBuffers and SharedArrayBuffers
}

// CPU time spent since the previous sample, in microseconds
export interface CpuSnapshot {
  user: number;     // User CPU time
  system: number;   // System CPU time
}

// Event loop delay since the previous sample, in milliseconds
export interface EventLoopSnapshot {
  min: number;
  max: number;
  mean: number;
  p99: number;
}

// One sample of process health metrics
export interface ProcessSnapshot {
  hostname: string;                 // Host the process runs on
  memory: MemorySnapshot;
  cpu: CpuSnapshot;
  uptime: number;                   // Process uptime in seconds
  eventLoop?: EventLoopSnapshot;    // Missing when no delay was recorded yet
}
