// Import InfluxDB 3.x Point class for building data points
import { Point } from '@influxdata/influxdb3-client';
// Import process snapshot types for input data structure
import type { ProcessSnapshot } from '../metrics/types.js';

// Transform a process snapshot into InfluxDB points
// All points share the timestamp passed in by the caller (time of sampling)
export function mapSnapshotToPoints(snapshot: ProcessSnapshot, timestamp: Date): Point[] {
  const points: Point[] = [
    // Memory usage in bytes
    Point.measurement('process_memory')
      .setTag('host', snapshot.hostname)
      .setIntegerField('rss', snapshot.memory.rss)
      .setIntegerField('heap_total', snapshot.memory.heapTotal)
      .setIntegerField('heap_used', snapshot.memory.heapUsed)
      .setIntegerField('external', snapshot.memory.external)
      .setIntegerField('array_buffers', snapshot.memory.arrayBuffers)
      .setTimestamp(timestamp),
    // CPU time since the previous sample, in microseconds
    Point.measurement('process_cpu')
      .setTag('host', snapshot.hostname)
      .setIntegerField('user_us', snapshot.cpu.user)
      .setIntegerField('system_us', snapshot.cpu.system)
      .setTimestamp(timestamp),
    // Uptime in seconds
    Point.measurement('process_uptime')
      .setTag('host', snapshot.hostname)
      .setFloatField('seconds', snapshot.uptime)
      .setTimestamp(timestamp),
  ];

  // Event loop delay is only present once the histogram has recorded samples
  if (snapshot.eventLoop) {
    points.push(
      Point.measurement('event_loop_delay')
        .setTag('host', snapshot.hostname)
        .setFloatField('min_ms', snapshot.eventLoop.min)
        .setFloatField('max_ms', snapshot.eventLoop.max)
        .setFloatField('mean_ms', snapshot.eventLoop.mean)
        .setFloatField('p99_ms', snapshot.eventLoop.p99)
        .setTimestamp(timestamp)
    );
  }

  return points;
}
