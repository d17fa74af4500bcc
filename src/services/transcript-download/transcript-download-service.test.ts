/**
 * Tests for TranscriptDownloadService
 *
 * Runs the real client, progress store and archive against an in-process
 * fake of the Gong API (stubbed fetch) and a temporary output directory.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mockDeep } from 'vitest-mock-extended';
import type { DeepMockProxy } from 'vitest-mock-extended';
import { TranscriptDownloadService } from './transcript-download-service.js';
import { DownloadInProgressError, type StateChange } from './types.js';
import { ArchiveConfig } from '../../config/index.js';
import {
  GongApiError,
  GongClient,
  GongConnectionError,
  type CallRecord,
  type CallTranscript,
} from '../../clients/gong/index.js';
import {
  ProgressPersistenceError,
  ProgressStore,
  emptySnapshot,
} from '../progress/index.js';
import { TranscriptArchive } from '../archive/index.js';
import type { RequestScheduler } from '../../utils/request-scheduler/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function callId(n: number): string {
  return `c${String(n).padStart(3, '0')}`;
}

function idRange(from: number, to: number): string[] {
  return Array.from({ length: to - from + 1 }, (_, i) => callId(from + i));
}

function makeCalls(count: number): CallRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: callId(i + 1),
    title: i % 2 === 0 ? `Demo ${i + 1}` : `Renewal ${i + 1}`,
    started: '2024-01-15T10:00:00Z',
    duration: 600000,
  }));
}

function transcriptFor(id: string): CallTranscript {
  return {
    callId: id,
    transcript: [{ speakerId: 's1', topic: null, sentences: [{ start: 0, end: 900, text: `Hi ${id}` }] }],
  };
}

/**
 * Minimal in-process stand-in for the Gong v2 endpoints used by the service
 */
class FakeGongApi {
  connectionRequests = 0;
  readonly extensiveRequests: Array<string | undefined> = [];
  readonly transcriptRequests: string[][] = [];
  connectionStatus = 200;
  failExtensive = false;
  failTranscriptRequest?: number;
  withoutTranscript = new Set<string>();
  connectionGate?: Promise<void>;
  afterTranscriptRequest?: (count: number) => void;

  constructor(
    private readonly calls: CallRecord[],
    private readonly pageSize = 100
  ) {}

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(String(input));
    const body: { cursor?: string; filter?: { callIds?: string[] } } = init?.body
      ? JSON.parse(String(init.body))
      : {};

    switch (url.pathname) {
      case '/v2/calls': {
        this.connectionRequests++;
        await this.connectionGate;
        if (this.connectionStatus !== 200) {
          return new Response('Unauthorized', { status: this.connectionStatus });
        }
        return jsonResponse({ records: { totalRecords: this.calls.length }, calls: [] });
      }

      case '/v2/calls/extensive': {
        this.extensiveRequests.push(body.cursor);
        if (this.failExtensive) {
          return new Response('upstream failure', { status: 500 });
        }
        const offset = body.cursor ? Number(body.cursor) : 0;
        const next = offset + this.pageSize;
        return jsonResponse({
          records: {
            totalRecords: this.calls.length,
            ...(next < this.calls.length && { cursor: String(next) }),
          },
          calls: this.calls
            .slice(offset, next)
            .map(({ parties, ...metaData }) => ({ metaData, parties: parties ?? [] })),
        });
      }

      case '/v2/calls/transcript': {
        const ids = body.filter?.callIds ?? [];
        this.transcriptRequests.push(ids);
        const count = this.transcriptRequests.length;
        this.afterTranscriptRequest?.(count);
        if (count === this.failTranscriptRequest) {
          return new Response('upstream failure', { status: 500 });
        }
        return jsonResponse({
          callTranscripts: ids.filter((id) => !this.withoutTranscript.has(id)).map(transcriptFor),
        });
      }

      default:
        return new Response('Not Found', { status: 404 });
    }
  };
}

describe('TranscriptDownloadService', () => {
  let dir: string;
  let config: ArchiveConfig;
  let requestSchedulerMock: DeepMockProxy<RequestScheduler>;

  function createClient(): GongClient {
    return new GongClient({
      config,
      requestScheduler: requestSchedulerMock,
      retryOptions: { maxAttempts: 1 },
    });
  }

  function useApi(api: FakeGongApi): FakeGongApi {
    vi.stubGlobal('fetch', vi.fn(api.fetch));
    return api;
  }

  function createService(): TranscriptDownloadService {
    return new TranscriptDownloadService({ config, client: createClient() });
  }

  async function exists(filePath: string): Promise<boolean> {
    return fs.access(filePath).then(
      () => true,
      () => false
    );
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcript-download-'));
    config = new ArchiveConfig({
      GONG_ACCESS_KEY: 'test-key',
      GONG_ACCESS_KEY_SECRET: 'test-secret',
      GONG_SUBDOMAIN: 'acme',
      DOWNLOAD_START_DATE: '2024-01-01',
      DOWNLOAD_END_DATE: '2024-01-31',
      OUTPUT_DIRECTORY: dir,
    });

    // Mock RequestScheduler to execute tasks immediately
    requestSchedulerMock = mockDeep<RequestScheduler>();
    requestSchedulerMock.schedule.mockImplementation(async (task) => {
      return await task();
    });
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  // ============================================================================
  // Full runs
  // ============================================================================

  describe('complete run', () => {
    it('should discover, fetch and persist every call', async () => {
      const api = useApi(new FakeGongApi(makeCalls(250)));
      const service = createService();

      const summary = await service.run();

      expect(api.connectionRequests).toBe(1);
      expect(api.extensiveRequests).toEqual([undefined, '100', '200']);
      expect(api.transcriptRequests.map((batch) => batch.length)).toEqual([100, 100, 50]);
      expect(summary).toMatchObject({
        totalCalls: 250,
        downloadedTranscripts: 250,
        failedIds: [],
        missingTranscriptIds: [],
        successRate: 1,
        resumed: false,
        requestedIds: 250,
        outputDirectory: path.join(dir, '2024'),
      });
      expect(summary.runId).toEqual(expect.any(String));
      expect(service.getState()).toBe('done');
    });

    it('should write artifacts and delete the snapshot', async () => {
      useApi(new FakeGongApi(makeCalls(3)));

      await createService().run();

      const outputPath = path.join(dir, '2024');
      expect((await fs.readdir(path.join(outputPath, 'raw_json'))).sort()).toEqual([
        'all_data.json',
        'call_c001.json',
        'call_c002.json',
        'call_c003.json',
      ]);
      expect(await fs.readdir(path.join(outputPath, 'by_date', '2024-01-15'))).toHaveLength(3);
      expect(await exists(config.progressFilePath)).toBe(false);
    });

    it('should report calls without a transcript separately', async () => {
      const api = new FakeGongApi(makeCalls(5));
      api.withoutTranscript.add('c002');
      useApi(api);

      const summary = await createService().run();

      expect(summary).toMatchObject({
        totalCalls: 5,
        downloadedTranscripts: 4,
        failedIds: [],
        missingTranscriptIds: ['c002'],
        successRate: 0.8,
      });
      expect(await fs.readdir(path.join(dir, '2024', 'transcripts'))).toHaveLength(4);
    });

    it('should skip a failed batch and report its ids', async () => {
      const api = new FakeGongApi(makeCalls(250));
      api.failTranscriptRequest = 2;
      useApi(api);

      const summary = await createService().run();

      expect(summary.failedIds).toEqual(idRange(101, 200));
      expect(summary.downloadedTranscripts).toBe(150);
      expect(summary.missingTranscriptIds).toEqual([]);
      expect(summary.successRate).toBe(0.6);
    });

    it('should only fetch calls matching the title filter', async () => {
      const api = useApi(new FakeGongApi(makeCalls(6)));

      const summary = await createService().run({ titleFilter: 'renewal' });

      expect(api.transcriptRequests).toEqual([['c002', 'c004', 'c006']]);
      expect(summary.totalCalls).toBe(3);
    });

    it('should finish cleanly when the range has no calls', async () => {
      const api = useApi(new FakeGongApi([]));

      const summary = await createService().run();

      expect(api.transcriptRequests).toEqual([]);
      expect(summary).toMatchObject({ totalCalls: 0, downloadedTranscripts: 0, successRate: 0 });
    });
  });

  // ============================================================================
  // Resume
  // ============================================================================

  describe('resume', () => {
    it('should fetch only the remaining ids after an interrupted run', async () => {
      const calls = makeCalls(250);
      const controller = new AbortController();
      const firstApi = new FakeGongApi(calls);
      firstApi.afterTranscriptRequest = (count) => {
        if (count === 1) {
          controller.abort(new Error('interrupted'));
        }
      };
      useApi(firstApi);
      const service = createService();

      await expect(service.run({ signal: controller.signal })).rejects.toThrow('interrupted');
      expect(service.getState()).toBe('failed');
      expect(firstApi.transcriptRequests).toHaveLength(1);

      const saved = await new ProgressStore(config.progressFilePath).load();
      expect(saved.discoveredRecords).toHaveLength(250);
      expect(saved.fetchedIds).toEqual(new Set(idRange(1, 100)));

      const secondApi = useApi(new FakeGongApi(calls));
      const summary = await service.run();

      expect(secondApi.extensiveRequests).toEqual([]);
      expect(secondApi.transcriptRequests.flat()).toEqual(idRange(101, 250));
      expect(summary).toMatchObject({
        totalCalls: 250,
        downloadedTranscripts: 250,
        resumed: true,
        requestedIds: 150,
      });
      expect(await exists(config.progressFilePath)).toBe(false);
    });

    it('should fetch only the ids of failed batches on the next run', async () => {
      const calls = makeCalls(250);
      const firstApi = new FakeGongApi(calls);
      firstApi.failTranscriptRequest = 2;
      useApi(firstApi);
      const service = createService();

      const first = await service.run();

      expect(first.failedIds).toEqual(idRange(101, 200));
      expect(service.getState()).toBe('done');
      const saved = await new ProgressStore(config.progressFilePath).load();
      expect(saved.discoveredRecords).toHaveLength(250);
      expect(saved.fetchedIds).toEqual(new Set([...idRange(1, 100), ...idRange(201, 250)]));

      const secondApi = useApi(new FakeGongApi(calls));
      const second = await service.run();

      expect(secondApi.extensiveRequests).toEqual([]);
      expect(secondApi.transcriptRequests).toEqual([idRange(101, 200)]);
      expect(second).toMatchObject({
        totalCalls: 250,
        downloadedTranscripts: 250,
        failedIds: [],
        resumed: true,
        requestedIds: 100,
      });
      expect(await exists(config.progressFilePath)).toBe(false);
    });

    it('should make no list or transcript requests when everything was fetched', async () => {
      const calls = makeCalls(5);
      const archive = new TranscriptArchive(config.outputPath);
      await archive.prepare();
      for (const call of calls) {
        await archive.writeCall(call, transcriptFor(call.id));
      }
      await new ProgressStore(config.progressFilePath).save({
        discoveredRecords: calls,
        fetchedIds: new Set(calls.map((call) => call.id)),
      });
      const api = useApi(new FakeGongApi(calls));

      const summary = await createService().run();

      expect(api.extensiveRequests).toEqual([]);
      expect(api.transcriptRequests).toEqual([]);
      expect(summary).toMatchObject({
        totalCalls: 5,
        downloadedTranscripts: 5,
        resumed: true,
        requestedIds: 0,
      });
    });

    it('should list again and keep fetched ids under always-rediscover', async () => {
      const known = makeCalls(5);
      const archive = new TranscriptArchive(config.outputPath);
      await archive.prepare();
      await archive.writeCall(known[0], transcriptFor('c001'));
      await archive.writeCall(known[1], transcriptFor('c002'));
      await new ProgressStore(config.progressFilePath).save({
        discoveredRecords: known,
        fetchedIds: new Set(['c001', 'c002']),
      });
      const api = useApi(new FakeGongApi(makeCalls(6)));

      const summary = await createService().run({ resumePolicy: 'always-rediscover' });

      expect(api.extensiveRequests).toEqual([undefined]);
      expect(api.transcriptRequests).toEqual([['c003', 'c004', 'c005', 'c006']]);
      expect(summary).toMatchObject({ totalCalls: 6, downloadedTranscripts: 6, resumed: false });
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe('failures', () => {
    it('should fail before discovery when the connection check fails', async () => {
      const api = new FakeGongApi(makeCalls(5));
      api.connectionStatus = 401;
      useApi(api);
      const service = createService();

      await expect(service.run()).rejects.toBeInstanceOf(GongConnectionError);
      expect(service.getState()).toBe('failed');
      expect(api.extensiveRequests).toEqual([]);
      expect(await exists(config.progressFilePath)).toBe(false);
    });

    it('should fail the run when discovery fails', async () => {
      const api = new FakeGongApi(makeCalls(5));
      api.failExtensive = true;
      useApi(api);
      const service = createService();

      await expect(service.run()).rejects.toBeInstanceOf(GongApiError);
      expect(service.getState()).toBe('failed');
      expect(api.transcriptRequests).toEqual([]);
    });

    it('should stop when a checkpoint cannot be saved', async () => {
      const api = useApi(new FakeGongApi(makeCalls(250)));
      const progressStoreMock = mockDeep<ProgressStore>();
      progressStoreMock.load.mockResolvedValue(emptySnapshot());
      progressStoreMock.save
        .mockResolvedValueOnce(undefined)
        .mockRejectedValue(new ProgressPersistenceError('save', '/unwritable/download_progress.json'));
      const service = new TranscriptDownloadService({
        config,
        client: createClient(),
        progressStore: progressStoreMock,
      });

      await expect(service.run()).rejects.toBeInstanceOf(ProgressPersistenceError);
      expect(api.transcriptRequests).toHaveLength(1);
      expect(service.getState()).toBe('failed');
      // discovery, first checkpoint, best-effort save after failure
      expect(progressStoreMock.save).toHaveBeenCalledTimes(3);
      expect(progressStoreMock.clear).not.toHaveBeenCalled();
    });
  });

  // ============================================================================
  // State machine
  // ============================================================================

  describe('state machine', () => {
    it('should walk through every state and allow another run afterwards', async () => {
      useApi(new FakeGongApi(makeCalls(2)));
      const service = createService();
      const changes: StateChange[] = [];

      expect(service.getState()).toBe('idle');
      await service.run({ onStateChange: (change) => changes.push(change) });
      await service.run({ onStateChange: (change) => changes.push(change) });

      expect(changes.map(({ from, to }) => `${from}->${to}`)).toEqual([
        'idle->discovering',
        'discovering->fetching',
        'fetching->persisting',
        'persisting->done',
        'done->discovering',
        'discovering->fetching',
        'fetching->persisting',
        'persisting->done',
      ]);
      expect(changes[0]?.runId).not.toBe(changes[4]?.runId);
    });

    it('should reject a second run while one is active', async () => {
      const api = new FakeGongApi(makeCalls(2));
      let open: () => void = () => undefined;
      api.connectionGate = new Promise<void>((resolve) => {
        open = resolve;
      });
      useApi(api);
      const service = createService();

      const first = service.run();
      await expect(service.run()).rejects.toBeInstanceOf(DownloadInProgressError);
      expect(service.getState()).toBe('discovering');

      open();
      await expect(first).resolves.toMatchObject({ totalCalls: 2 });
    });
  });
});
