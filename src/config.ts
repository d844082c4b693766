// Import dotenv to load environment variables from .env file
import 'dotenv/config';
// Import node-cron to validate the report schedule
import cron from 'node-cron';
// Import the InfluxDB client configuration shape
import type { InfluxClientConfig } from './influx/client.js';
import type { ConsistencyLevel } from './influx/dispatcher.js';

// Interface defining the shape of our application configuration
export interface Config {
  influx: InfluxClientConfig;   // InfluxDB connection and write settings
  reportInterval: string;       // Cron expression for the reporting schedule
}

// Consistency levels the write endpoint understands
const CONSISTENCY_LEVELS: readonly ConsistencyLevel[] = ['any', 'one', 'quorum', 'all'];

// Helper function to get required environment variables
// Throws an error if the variable is not set
function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

// Helper function to get optional environment variables
// Returns undefined if the variable is not set
function optionalEnv(name: string): string | undefined {
  return process.env[name] || undefined;
}

function isConsistencyLevel(value: string): value is ConsistencyLevel {
  return CONSISTENCY_LEVELS.some((level) => level === value);
}

// Parse the optional consistency level
function parseConsistency(value: string | undefined): ConsistencyLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = value.toLowerCase();
  if (!isConsistencyLevel(level)) {
    throw new Error(`Invalid INFLUX_CONSISTENCY: ${value} (expected one of ${CONSISTENCY_LEVELS.join(', ')})`);
  }
  return level;
}

// Parse default tags from "key=value,key=value"
export function parseTags(value: string | undefined): Record<string, string> {
  const tags: Record<string, string> = {};
  if (!value) {
    return tags;
  }
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    // Tolerate trailing or doubled commas
    if (!trimmed) continue;
    const separator = trimmed.indexOf('=');
    const key = trimmed.slice(0, separator).trim();
    const tagValue = trimmed.slice(separator + 1).trim();
    if (separator <= 0 || !key || !tagValue) {
      throw new Error(`Invalid tag in INFLUX_TAGS: ${entry}`);
    }
    tags[key] = tagValue;
  }
  return tags;
}

// Validate the cron expression before the scheduler sees it
function parseSchedule(value: string): string {
  if (!cron.validate(value)) {
    throw new Error(`Invalid REPORT_INTERVAL cron expression: ${value}`);
  }
  return value;
}

// Export the configuration object built from environment variables
export const config: Config = {
  // InfluxDB configuration section
  influx: {
    connectString: process.env.INFLUX_URL || 'http://localhost:8086',  // Base URL of InfluxDB
    database: requireEnv('INFLUX_DATABASE'),                            // Required: database name
    username: optionalEnv('INFLUX_USERNAME'),                           // Optional: auth username
    password: optionalEnv('INFLUX_PASSWORD'),                           // Optional: auth password
    retentionPolicy: optionalEnv('INFLUX_RETENTION'),                   // Optional: retention policy
    consistency: parseConsistency(optionalEnv('INFLUX_CONSISTENCY')),   // Optional: write consistency
    tags: parseTags(optionalEnv('INFLUX_TAGS')),                        // Default tags for every point
  },
  // Reporting schedule - defaults to every minute
  reportInterval: parseSchedule(process.env.REPORT_INTERVAL || '* * * * *'),
};
