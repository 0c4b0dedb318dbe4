/**
 * End-to-end ingestion tests
 *
 * Full runs over fixture directories in os.tmpdir(), with global fetch
 * replaced by an in-process ingest endpoint that stores one document per
 * (user_id, date).
 *
 * @module tests/pipeline/end-to-end
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { runIngestion } from '../../src/pipeline/index.js';
import { VectorIngestClient } from '../../src/delivery/index.js';
import { IngestPayloadSchema, type IngestPayload } from '../../src/schemas/index.js';

const API_URL = 'http://ingest.test/ingest';

const profileA = {
  user_id: 'u1',
  name: 'A',
  age: 30,
  gender: 'f',
  height: 170,
  weight: 60,
  fitness_level: 'moderate',
};

const breakfast = {
  user_id: 'u1',
  date: '2024-01-01',
  calories: 500,
  meal_type: 'breakfast',
  protein: 20,
  carbs: 60,
  fat: 15,
};

// ============================================================================
// In-process endpoint
// ============================================================================

/**
 * Idempotent store keyed by user_id/date. `failures` lists the status codes
 * returned for the first requests before it starts accepting.
 */
class FakeIngestEndpoint {
  readonly documents = new Map<string, IngestPayload>();
  readonly requests: IngestPayload[] = [];
  private failures: number[];

  constructor(
    failures: number[] = [],
    private readonly alwaysFail: ReadonlySet<string> = new Set()
  ) {
    this.failures = [...failures];
  }

  readonly fetch: typeof fetch = async (_input, init) => {
    const payload = IngestPayloadSchema.parse(JSON.parse(String(init?.body)));
    this.requests.push(payload);

    if (this.alwaysFail.has(payload.meta.user_id)) {
      return new Response('{"status":"error"}', { status: 500 });
    }
    const failure = this.failures.shift();
    if (failure !== undefined) {
      return new Response('{"status":"error"}', { status: failure });
    }

    this.documents.set(`${payload.meta.user_id}/${payload.meta.date}`, payload);
    return new Response('{"status":"ok"}', { status: 200 });
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('end-to-end ingestion', () => {
  const originalFetch = global.fetch;
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'health-ingest-e2e-'));
  });

  afterEach(async () => {
    global.fetch = originalFetch;
    await rm(dataDir, { recursive: true, force: true });
  });

  async function writeJson(file: string, value: unknown): Promise<void> {
    await writeFile(join(dataDir, file), JSON.stringify(value));
  }

  function install(endpoint: FakeIngestEndpoint): void {
    global.fetch = jest.fn<typeof fetch>(endpoint.fetch);
  }

  function run(options: { batchSize?: number } = {}) {
    return runIngestion({
      dataDir,
      client: new VectorIngestClient(API_URL, { retryDelayMs: 1 }),
      ...options,
    });
  }

  it('delivers a single nutrition day with the profile header', async () => {
    await writeJson('users.json', [profileA]);
    await writeJson('nutrition.json', [breakfast]);
    const endpoint = new FakeIngestEndpoint();
    install(endpoint);

    const result = await run();

    expect(result.delivery).toEqual({
      submitted: 1,
      delivered: 1,
      failed: 0,
      attempts: 1,
      batches: 1,
      failedKeys: [],
    });
    expect(endpoint.requests).toHaveLength(1);
    const [payload] = endpoint.requests;
    expect(payload.meta).toEqual({ user_id: 'u1', date: '2024-01-01', type: 'daily_summary' });
    expect(
      payload.text.startsWith(
        'A (30 years old f, 170 cm, 60 kg, moderate fitness level) ' +
          'Ate 500 calories at breakfast (20g protein, 60g carbs, 15g fat).'
      )
    ).toBe(true);
  });

  it('sends the placeholder for an unknown user', async () => {
    await writeJson('users.json', [profileA]);
    await writeJson('nutrition.json', [{ ...breakfast, user_id: 'u_ghost', date: '2024-01-02' }]);
    const endpoint = new FakeIngestEndpoint();
    install(endpoint);

    await run();

    expect(endpoint.documents.get('u_ghost/2024-01-02')?.text).toBe(
      'Unknown user u_ghost on 2024-01-02'
    );
  });

  it('buckets a record by the day part of date_time', async () => {
    await writeJson('users.json', [profileA]);
    const { date: _date, ...withoutDate } = breakfast;
    await writeJson('nutrition.json', [{ ...withoutDate, date_time: '2024-01-03 08:15:00' }]);
    const endpoint = new FakeIngestEndpoint();
    install(endpoint);

    await run();

    expect([...endpoint.documents.keys()]).toEqual(['u1/2024-01-03']);
  });

  it('emits a heart-rate-only day at the final flush', async () => {
    await writeJson('users.json', [profileA]);
    await writeJson(
      'heart_rate.json',
      [60, 72, 88].map((value, i) => ({
        user_id: 'u1',
        date_time: `2024-01-04 0${i + 6}:00:00`,
        value,
      }))
    );
    const endpoint = new FakeIngestEndpoint();
    install(endpoint);

    const result = await runIngestion({
      dataDir,
      client: new VectorIngestClient(API_URL, { retryDelayMs: 1 }),
      flushEvery: 1,
    });

    expect(result.summariesRendered).toBe(1);
    expect(endpoint.documents.get('u1/2024-01-04')?.text).toContain(
      'Heart rate ranged 60–88 bpm during the day.'
    );
  });

  it('counts a summary delivered after one server error', async () => {
    await writeJson('users.json', [profileA]);
    await writeJson('nutrition.json', [breakfast]);
    const endpoint = new FakeIngestEndpoint([500]);
    install(endpoint);

    const result = await run();

    expect(result.delivery.delivered).toBe(1);
    expect(result.delivery.failed).toBe(0);
    expect(result.delivery.attempts).toBe(2);
    expect(endpoint.requests).toHaveLength(2);
    expect(endpoint.documents.size).toBe(1);
  });

  it('reports a permanent failure without affecting the rest of the batch', async () => {
    await writeJson('users.json', [profileA, { ...profileA, user_id: 'u2', name: 'B' }]);
    await writeJson('nutrition.json', [breakfast, { ...breakfast, user_id: 'u2' }]);
    const endpoint = new FakeIngestEndpoint([], new Set(['u1']));
    install(endpoint);

    const result = await run({ batchSize: 10 });

    expect(result.delivery).toEqual({
      submitted: 2,
      delivered: 1,
      failed: 1,
      attempts: 4,
      batches: 1,
      failedKeys: ['u1/2024-01-01'],
    });
    expect(endpoint.requests.filter((p) => p.meta.user_id === 'u1')).toHaveLength(3);
    expect([...endpoint.documents.keys()]).toEqual(['u2/2024-01-01']);
  });

  it('produces the same documents on a second run', async () => {
    await writeJson('users.json', [profileA]);
    await writeJson('nutrition.json', [breakfast, { ...breakfast, date: '2024-01-05' }]);
    const endpoint = new FakeIngestEndpoint();
    install(endpoint);

    await run();
    const first = new Map(endpoint.documents);
    await run();

    expect(endpoint.documents).toEqual(first);
    expect(endpoint.requests).toHaveLength(4);
  });
});
