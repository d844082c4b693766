// Tests for lazy database creation
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DatabaseInitializer, buildCreateDatabaseUrl, nextDatabaseState } from './database.js';

// Query endpoint answer for a successful CREATE DATABASE
const CREATED_BODY = JSON.stringify({ results: [{ statement_id: 0 }] });

describe('buildCreateDatabaseUrl', () => {
  it('encodes the CREATE DATABASE statement', () => {
    const url = buildCreateDatabaseUrl('http://localhost:8086', 'metrics');

    expect(url.toString()).toBe('http://localhost:8086/query?q=CREATE+DATABASE+metrics');
  });

  it('quotes database names that are not plain identifiers', () => {
    const url = buildCreateDatabaseUrl('http://localhost:8086', 'kafka-metrics');

    expect(url.searchParams.get('q')).toBe('CREATE DATABASE "kafka-metrics"');
  });
});

describe('nextDatabaseState', () => {
  it('becomes ready after a successful attempt', () => {
    expect(nextDatabaseState('not-ready', true)).toBe('ready');
  });

  it('stays not ready after a failed attempt', () => {
    expect(nextDatabaseState('not-ready', false)).toBe('not-ready');
  });

  it('stays ready regardless of later attempts', () => {
    expect(nextDatabaseState('ready', false)).toBe('ready');
  });
});

describe('DatabaseInitializer', () => {
  let errorSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    // Silence startup logs
    vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.fn();
    vi.spyOn(console, 'error').mockImplementation(errorSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('creates the database and becomes ready', async () => {
    const fetchMock = vi.fn(async () => new Response(CREATED_BODY, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(initializer.ensureDatabase()).resolves.toBe(true);

    expect(initializer.isReady).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not ask again once the database is ready', async () => {
    const fetchMock = vi.fn(async () => new Response(CREATED_BODY, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await initializer.ensureDatabase();
    await expect(initializer.ensureDatabase()).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(initializer.isReady).toBe(true);
  });

  it('treats a repeated CREATE DATABASE on separate clients as success', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(CREATED_BODY, { status: 200 })));

    const first = new DatabaseInitializer('http://localhost:8086', 'metrics');
    const second = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(first.ensureDatabase()).resolves.toBe(true);
    await expect(second.ensureDatabase()).resolves.toBe(true);
  });

  it('sends credentials when configured', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(CREATED_BODY, { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics', 'Basic YWRtaW46dGVzdC1zZWNyZXQ=');

    await initializer.ensureDatabase();

    const [input, init] = fetchMock.mock.calls[0];
    expect(input.toString()).toBe('http://localhost:8086/query?q=CREATE+DATABASE+metrics');
    expect(new Headers(init?.headers).get('authorization')).toBe('Basic YWRtaW46dGVzdC1zZWNyZXQ=');
  });

  it('stays not ready when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8086') });
    }));
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(initializer.ensureDatabase()).resolves.toBe(false);

    expect(initializer.isReady).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      'Cannot create database metrics: fetch failed: connect ECONNREFUSED 127.0.0.1:8086'
    );
  });

  it('stays not ready on a non-2xx status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 401, statusText: 'Unauthorized' })));
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(initializer.ensureDatabase()).resolves.toBe(false);

    expect(errorSpy).toHaveBeenCalledWith('Cannot create database metrics: 401 Unauthorized');
  });

  it('stays not ready when the statement reports an error', async () => {
    const body = JSON.stringify({ results: [{ statement_id: 0, error: 'database name required' }] });
    vi.stubGlobal('fetch', vi.fn(async () => new Response(body, { status: 200 })));
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(initializer.ensureDatabase()).resolves.toBe(false);

    expect(errorSpy).toHaveBeenCalledWith('Cannot create database metrics: database name required');
  });

  it('retries after a failed attempt', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(new Response(CREATED_BODY, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    await expect(initializer.ensureDatabase()).resolves.toBe(false);
    await expect(initializer.ensureDatabase()).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('shares one attempt between concurrent callers', async () => {
    const fetchMock = vi.fn(async () => new Response(CREATED_BODY, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const initializer = new DatabaseInitializer('http://localhost:8086', 'metrics');

    const results = await Promise.all([initializer.ensureDatabase(), initializer.ensureDatabase()]);

    expect(results).toEqual([true, true]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
