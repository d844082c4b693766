// Import the InfluxDB 3.x Point class that renders each line
import type { Point } from '@influxdata/influxdb3-client';

// Initial capacity of each serialization buffer (64 KiB)
export const BUFFER_ALLOC = 1024 * 64;

// Idle buffers kept around for reuse
const MAX_IDLE_BUFFERS = 4;

// Default tags merged into every line
export type Tags = Readonly<Record<string, string>>;

// One encoded batch, backed by a leased buffer
export interface EncodedBatch {
  payload: Buffer;    // Readable view over exactly the bytes written for this batch
  release(): void;    // Return the backing buffer to the pool (idempotent)
}

// Serializes batches of points into newline-delimited line protocol
// A buffer is leased per batch and only reused once released,
// so a payload still read by a request is never overwritten
export class LineEncoder {
  // Buffers released by earlier batches
  private readonly idle: Buffer[] = [];

  constructor(private readonly capacity: number = BUFFER_ALLOC) {}

  // Encode the points with millisecond timestamps, merging default tags into each line
  encode(points: readonly Point[], defaultTags: Tags): EncodedBatch {
    // Lease a buffer and start writing from the beginning
    let buffer = this.idle.pop() ?? Buffer.alloc(this.capacity);
    let position = 0;

    try {
      for (const point of points) {
        // Default tags never override the point's own tags, the point is left untouched
        const rendered = point.toLineProtocol('ms', { ...defaultTags });
        if (rendered === undefined) {
          throw new Error(`Point '${point.getMeasurement()}' has no fields`);
        }
        const line = `${rendered}\n`;
        const required = position + Buffer.byteLength(line, 'utf8');
        // Grow the buffer if this line does not fit
        if (required > buffer.length) {
          buffer = this.grow(buffer, position, required);
        }
        position += buffer.write(line, position, 'utf8');
      }
    } catch (error) {
      // Give the buffer back before the error reaches the caller
      this.recycle(buffer);
      throw error;
    }

    const leased = buffer;
    let released = false;
    return {
      payload: leased.subarray(0, position),
      release: () => {
        if (released) return;
        released = true;
        this.recycle(leased);
      },
    };
  }

  // Copy written bytes into a larger buffer
  private grow(buffer: Buffer, position: number, required: number): Buffer {
    let size = Math.max(buffer.length, 1) * 2;
    while (size < required) size *= 2;
    const next = Buffer.alloc(size);
    buffer.copy(next, 0, 0, position);
    return next;
  }

  private recycle(buffer: Buffer): void {
    if (this.idle.length < MAX_IDLE_BUFFERS) {
      this.idle.push(buffer);
    }
  }
}
