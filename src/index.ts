// Import node-cron for scheduling periodic tasks
import cron from 'node-cron';
// Import application configuration
import { config } from './config.js';
// Import InfluxDB client factory
import { createInfluxClient } from './influx/client.js';
// Import snapshot transformation
import { mapSnapshotToPoints } from './influx/mapper.js';
// Import the process metrics sampler
import { ProcessSampler } from './metrics/sampler.js';

// Main application entry point
async function main() {
  // Log startup message
  console.log('influx-line-reporter starting...');
  // Log InfluxDB connection info
  console.log(`InfluxDB: ${config.influx.connectString}/${config.influx.database}`);
  // Log reporting schedule
  console.log(`Report interval: ${config.reportInterval}`);

  // Create the client and attempt database creation
  const influx = await createInfluxClient(config.influx);
  // Start recording event loop delay
  const sampler = new ProcessSampler();
  sampler.start();

  // Sample process metrics and hand them to the client
  async function report() {
    const timestamp = new Date();
    try {
      const points = mapSnapshotToPoints(sampler.sample(), timestamp);
      // Resolves once the request is submitted; delivery problems are logged by the client
      await influx.write(points);
      const stats = influx.getStats();
      console.log(
        `[${timestamp.toISOString()}] Submitted ${points.length} points ` +
          `(delivered: ${stats.delivered}, failed: ${stats.failed}, skipped: ${stats.skipped})`
      );
    } catch (error) {
      console.error(`[${timestamp.toISOString()}] Report failed:`, error);
    }
  }

  // Schedule recurring reports using cron expression
  const task = cron.schedule(config.reportInterval, report);
  console.log('Scheduler started. Press Ctrl+C to stop.');

  // Stop scheduling, wait for in-flight writes, then exit
  async function shutdown() {
    console.log('\nShutting down...');
    task.stop();
    sampler.stop();
    await influx.close();
    process.exit(0);
  }

  // Handle SIGINT (Ctrl+C) and SIGTERM for graceful shutdown
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch((error) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

// Execute main function and handle fatal errors
main().catch((error) => {
  // Log fatal error
  console.error('Fatal error:', error);
  // Exit with error code
  process.exit(1);
});
