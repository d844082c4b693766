// Import URL and error helpers shared with the write path
import { endpointUrl } from './dispatcher.js';
import { describeError } from './classifier.js';

// Whether the target database is known to exist
export type DatabaseState = 'not-ready' | 'ready';

// Ready is sticky; a failed attempt leaves a not-ready database not ready
export function nextDatabaseState(current: DatabaseState, succeeded: boolean): DatabaseState {
  return current === 'ready' || succeeded ? 'ready' : 'not-ready';
}

// Plain identifiers go unquoted, anything else is double-quoted
function quoteIdentifier(name: string): string {
  if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    return name;
  }
  return `"${name.replace(/["\\]/g, (char) => `\\${char}`)}"`;
}

// Build the query URL that creates the database
export function buildCreateDatabaseUrl(connectString: string, database: string): URL {
  const url = endpointUrl(connectString, 'query');
  url.searchParams.set('q', `CREATE DATABASE ${quoteIdentifier(database)}`);
  return url;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// The query endpoint reports statement errors inside a 200 response
function findStatementError(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  if (typeof body.error === 'string') {
    return body.error;
  }
  const results: unknown = body.results;
  if (!Array.isArray(results)) {
    return undefined;
  }
  for (const result of results) {
    if (isRecord(result) && typeof result.error === 'string') {
      return result.error;
    }
  }
  return undefined;
}

// Creates the target database on first use
// CREATE DATABASE is a no-op for an existing database; ready only stops repeat requests
export class DatabaseInitializer {
  private state: DatabaseState = 'not-ready';
  // Attempt in progress, shared by concurrent callers
  private pending?: Promise<DatabaseState>;

  constructor(
    private readonly connectString: string,
    private readonly database: string,
    private readonly authorization?: string
  ) {}

  get isReady(): boolean {
    return this.state === 'ready';
  }

  // Resolves true once the database is known to exist
  async ensureDatabase(): Promise<boolean> {
    if (this.state === 'ready') {
      return true;
    }
    if (!this.pending) {
      this.pending = this.attemptInit().finally(() => {
        this.pending = undefined;
      });
    }
    const succeeded = (await this.pending) === 'ready';
    this.state = nextDatabaseState(this.state, succeeded);
    return this.isReady;
  }

  private async attemptInit(): Promise<DatabaseState> {
    console.log(`Attempt to create InfluxDB database ${this.database}`);
    try {
      const url = buildCreateDatabaseUrl(this.connectString, this.database);

      // Initialize request headers
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (this.authorization) {
        headers['Authorization'] = this.authorization;
      }

      const response = await fetch(url, { headers });
      const text = await response.text();

      if (!response.ok) {
        console.error(`Cannot create database ${this.database}: ${response.status} ${response.statusText}`);
        return 'not-ready';
      }

      // Empty body means nothing went wrong
      const statementError = text ? findStatementError(JSON.parse(text)) : undefined;
      if (statementError) {
        console.error(`Cannot create database ${this.database}: ${statementError}`);
        return 'not-ready';
      }

      console.log(`InfluxDB database ${this.database} is ready`);
      return 'ready';
    } catch (error) {
      console.error(`Cannot create database ${this.database}: ${describeError(error)}`);
      return 'not-ready';
    }
  }
}
