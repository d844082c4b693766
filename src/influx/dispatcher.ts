// Import the classifier that observes each submitted request
import { ResponseClassifier } from './classifier.js';

// Consistency levels accepted by the write endpoint
export type ConsistencyLevel = 'any' | 'one' | 'quorum' | 'all';

// Where and how points are written
export interface WriteTarget {
  connectString: string;            // Base URL of the InfluxDB server (e.g., http://localhost:8086)
  database: string;                 // Target database
  retentionPolicy?: string;         // Optional retention policy (rp parameter)
  consistency?: ConsistencyLevel;   // Optional write consistency (consistency parameter)
}

// Build an endpoint URL below the connect string
// Throws TypeError when the connect string is not a valid URL
export function endpointUrl(connectString: string, path: string): URL {
  return new URL(`${connectString.replace(/\/+$/, '')}/${path}`);
}

// Build the Basic authorization header value, if any credentials are configured
export function basicAuthorization(username?: string, password?: string): string | undefined {
  if (username === undefined && password === undefined) {
    return undefined;
  }
  const credentials = Buffer.from(`${username ?? ''}:${password ?? ''}`).toString('base64');
  return `Basic ${credentials}`;
}

// Build the write URL with its query parameters
export function buildWriteUrl(target: WriteTarget): URL {
  const url = endpointUrl(target.connectString, 'write');
  url.searchParams.set('db', target.database);
  // Timestamps are always written in milliseconds
  url.searchParams.set('precision', 'ms');
  if (target.retentionPolicy) {
    url.searchParams.set('rp', target.retentionPolicy);
  }
  if (target.consistency) {
    url.searchParams.set('consistency', target.consistency);
  }
  return url;
}

// Submits line-protocol payloads to the write endpoint without waiting for the response
export class WriteDispatcher {
  constructor(
    private readonly target: WriteTarget,
    private readonly authorization?: string
  ) {}

  // Submit the payload; the returned promise settles with the classified outcome and never rejects
  dispatch(payload: Uint8Array): Promise<boolean> {
    // URL problems surface here, before anything is sent
    const url = buildWriteUrl(this.target);

    // Initialize request headers
    const headers: Record<string, string> = {
      'Content-Type': 'text/plain; charset=utf-8',
    };
    // Add auth header if credentials were provided
    if (this.authorization) {
      headers['Authorization'] = this.authorization;
    }

    const pending = fetch(url, { method: 'POST', headers, body: payload });
    return new ResponseClassifier(url.toString()).observe(pending);
  }
}
