// Import the write-path building blocks
import { DatabaseInitializer } from './database.js';
import { basicAuthorization, WriteDispatcher } from './dispatcher.js';
import type { ConsistencyLevel } from './dispatcher.js';
import { LineEncoder } from './encoder.js';
import type { Tags } from './encoder.js';
// Import the InfluxDB 3.x Point class accepted by write
import type { Point } from '@influxdata/influxdb3-client';

// Configuration interface for the InfluxDB connection
export interface InfluxClientConfig {
  connectString: string;            // Base URL of the InfluxDB server (e.g., http://localhost:8086)
  database: string;                 // Database to create and write to
  username?: string;                // Optional username for basic auth
  password?: string;                // Optional password for basic auth
  retentionPolicy?: string;         // Optional retention policy for writes
  consistency?: ConsistencyLevel;   // Optional write consistency level
  tags: Tags;                       // Default tags added to every point
}

// Delivery counters since the client was created
export interface WriteStats {
  dispatched: number;   // Requests submitted to the write endpoint
  delivered: number;    // Requests answered with 200 or 204
  failed: number;       // Requests that failed in transport or were rejected
  skipped: number;      // Writes dropped because the database was not ready
}

// Fire-and-forget writer for the InfluxDB 1.x line-protocol endpoint
// write() resolves once the request is submitted; delivery failures are only logged and counted
export class InfluxClient {
  private readonly initializer: DatabaseInitializer;
  private readonly dispatcher: WriteDispatcher;
  private readonly encoder = new LineEncoder();
  // Writes waiting on the database and requests that have not settled yet
  private readonly inFlight = new Set<Promise<void>>();
  private readonly stats: WriteStats = { dispatched: 0, delivered: 0, failed: 0, skipped: 0 };
  private closed = false;

  constructor(private readonly config: InfluxClientConfig) {
    // Credentials are computed once and reused for every request
    const authorization = basicAuthorization(config.username, config.password);
    this.initializer = new DatabaseInitializer(config.connectString, config.database, authorization);
    this.dispatcher = new WriteDispatcher(config, authorization);
  }

  get isReady(): boolean {
    return this.initializer.isReady;
  }

  // Create the database unless it is already known to exist
  ensureDatabase(): Promise<boolean> {
    return this.initializer.ensureDatabase();
  }

  // Write a batch of points; resolves when the request has been submitted
  async write(points: readonly Point[]): Promise<void> {
    if (this.closed) {
      throw new Error('InfluxDB client is closed');
    }

    const submission = this.submit(points);
    // Registered before any await so flush() also waits for writes still waiting on the database
    const pending = submission.then(
      () => {
        this.inFlight.delete(pending);
      },
      () => {
        this.inFlight.delete(pending);
      }
    );
    this.inFlight.add(pending);

    // Submission errors still reach the caller
    await submission;
  }

  // Create the database if needed, then encode and dispatch the batch
  private async submit(points: readonly Point[]): Promise<void> {
    // No data is written until the database exists
    if (!(await this.ensureDatabase())) {
      this.stats.skipped++;
      console.warn(`Skipping write of ${points.length} points: database ${this.config.database} is not ready`);
      return;
    }

    const batch = this.encoder.encode(points, this.config.tags);
    let outcome: Promise<boolean>;
    try {
      outcome = this.dispatcher.dispatch(batch.payload);
    } catch (error) {
      batch.release();
      throw error;
    }
    this.stats.dispatched++;

    // Track the outcome in the background and free the buffer when done
    const settled = outcome.then((delivered) => {
      batch.release();
      if (delivered) {
        this.stats.delivered++;
      } else {
        this.stats.failed++;
      }
      this.inFlight.delete(settled);
    });
    this.inFlight.add(settled);
  }

  getStats(): WriteStats {
    return { ...this.stats };
  }

  // Wait for every pending write and submitted request to settle
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  // Flush outstanding requests and refuse further writes (call on shutdown)
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }
}

// Factory function to create the client and attempt database creation once
export async function createInfluxClient(config: InfluxClientConfig): Promise<InfluxClient> {
  // Create the client instance
  const client = new InfluxClient(config);

  // A failure here is not fatal, the next write tries again
  if (await client.ensureDatabase()) {
    console.log(`Connected to InfluxDB at ${config.connectString}, database: ${config.database}`);
  } else {
    console.warn(`InfluxDB database ${config.database} not ready, will retry on next write`);
  }

  // Return the initialized client
  return client;
}
