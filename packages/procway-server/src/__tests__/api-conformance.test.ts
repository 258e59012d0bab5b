/**
 * HTTP API Conformance
 * OGC API Processes routes over the job manager, exercised with inject()
 */

import { MemoryKeyValueStore, StoreError } from 'procway-storage';
import { ProcwayServer } from '../index';
import { startTestServer, waitFor } from './test-utils';

const OGC_EXCEPTIONS = 'http://www.opengis.net/def/exceptions/ogcapi-processes-1/1.0';

describe('HTTP API', () => {
  describe('with an embedded worker', () => {
    let server: ProcwayServer;

    beforeEach(async () => {
      server = await startTestServer({ withWorker: true });
    });

    afterEach(async () => {
      await server.stop();
    });

    it('GET /health reports a ready server', async () => {
      const response = await server.getApp().inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'healthy',
        bootStatus: 'ready',
        processes: 2,
        worker: { embedded: true, active: 0 }
      });
    });

    it('runs an async job and serves the requested outputs', async () => {
      const app = server.getApp();
      const created = await app.inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: { text: 'hi' } }
      });

      expect(created.statusCode).toBe(201);
      const info = created.json();
      expect(info).toMatchObject({ processID: 'echo', type: 'process', status: 'accepted' });
      expect(created.headers.location).toBe(`/jobs/${info.jobID}`);

      await waitFor(async () => {
        const status = await app.inject({ method: 'GET', url: `/jobs/${info.jobID}` });
        return status.json().status === 'successful';
      });

      const status = await app.inject({ method: 'GET', url: `/jobs/${info.jobID}` });
      expect(status.json()).toMatchObject({ status: 'successful', progress: 100, message: 'Job completed' });
      expect(status.json().links).toEqual([
        { href: `/jobs/${info.jobID}`, rel: 'self', type: 'application/json', title: 'Job status' },
        {
          href: `/jobs/${info.jobID}/results`,
          rel: 'http://www.opengis.net/def/rel/ogc/1.0/results',
          type: 'application/json',
          title: 'Job results'
        }
      ]);

      const results = await app.inject({ method: 'GET', url: `/jobs/${info.jobID}/results?outputs=output_text` });
      expect(results.statusCode).toBe(200);
      expect(results.json()).toEqual({ output_text: 'HI' });
    });

    it('returns outputs directly in sync mode', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: { text: 'hi' }, mode: 'sync' }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toEqual({
        jobID: body.jobID,
        status: 'successful',
        type: 'process',
        outputs: { output_text: 'HI', length: 2 }
      });
    });

    it('takes requested outputs as an OGC outputs object', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: { text: 'hey' }, outputs: { length: {} }, mode: 'sync' }
      });

      expect(response.json().outputs).toEqual({ length: 3 });
    });

    it('serves a repeated request from the cache', async () => {
      const app = server.getApp();
      const payload = { inputs: { text: 'again' }, mode: 'sync' };
      await app.inject({ method: 'POST', url: '/processes/echo/execution', payload });

      const repeat = await app.inject({ method: 'POST', url: '/processes/echo/execution', payload });
      expect(repeat.statusCode).toBe(200);

      const job = await app.inject({ method: 'GET', url: `/jobs/${repeat.json().jobID}` });
      expect(job.json()).toMatchObject({ status: 'successful', message: 'Result retrieved from cache' });
    });

    it('answers Prefer: respond-async with 201 even when sync was asked for', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        headers: { prefer: 'respond-async' },
        payload: { inputs: { text: 'later' }, mode: 'sync' }
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().status).toBe('accepted');
    });

    it('reports a failed sync execution with the stored detail', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: { text: 'fail' }, mode: 'sync' }
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body).toMatchObject({ type: 'about:blank', title: 'JOB_FAILED', status: 500 });
      expect(body.detail).toMatch(/^Job [0-9a-f-]+ failed: Echo refused the text "fail"$/);
    });

    it('runs the countdown process', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/countdown/execution',
        payload: { inputs: { steps: 3 }, mode: 'sync' }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().outputs).toEqual({ completed_steps: 3 });
    });
  });

  describe('without a worker', () => {
    let server: ProcwayServer;

    beforeEach(async () => {
      server = await startTestServer();
    });

    afterEach(async () => {
      await server.stop();
    });

    async function submitEcho(text: string): Promise<string> {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: { text } }
      });
      return response.json().jobID;
    }

    it('declares its conformance classes', async () => {
      const response = await server.getApp().inject({ method: 'GET', url: '/conformance' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        conformsTo: [
          'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/core',
          'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/json',
          'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/job-list',
          'http://www.opengis.net/spec/ogcapi-processes-1/1.0/conf/dismiss'
        ]
      });
    });

    it('lists and describes processes', async () => {
      const app = server.getApp();

      const list = await app.inject({ method: 'GET', url: '/processes' });
      expect(list.json().processes.map((p: { id: string }) => p.id)).toEqual(['countdown', 'echo']);

      const echo = await app.inject({ method: 'GET', url: '/processes/echo' });
      expect(echo.statusCode).toBe(200);
      expect(echo.json()).toMatchObject({
        id: 'echo',
        jobControlOptions: ['sync-execute', 'async-execute', 'dismiss'],
        inputs: { text: { schema: { type: 'string', minLength: 1, maxLength: 1000 } } }
      });
    });

    it('answers unknown processes with no-such-process', async () => {
      const response = await server.getApp().inject({ method: 'GET', url: '/processes/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        type: `${OGC_EXCEPTIONS}/no-such-process`,
        title: 'PROCESS_NOT_FOUND',
        status: 404,
        detail: 'Process nope not found'
      });
    });

    it('rejects invalid inputs with 400', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: {} }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        type: 'about:blank',
        title: 'INVALID_INPUT',
        status: 400,
        detail: "Input validation failed for process echo: Invalid input 'text': Required"
      });
    });

    it('rejects malformed execute requests', async () => {
      const response = await server.getApp().inject({
        method: 'POST',
        url: '/processes/echo/execution',
        payload: { inputs: 'hi' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().detail).toBe('Invalid execute request: inputs: Expected object, received string');
    });

    it('reports results that are not ready yet', async () => {
      const jobId = await submitEcho('hi');
      const response = await server.getApp().inject({ method: 'GET', url: `/jobs/${jobId}/results` });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        type: `${OGC_EXCEPTIONS}/result-not-ready`,
        title: 'RESULT_NOT_READY',
        status: 404,
        detail: `Result for job ${jobId} is not ready (status: accepted)`
      });
    });

    it('dismisses jobs with DELETE', async () => {
      const app = server.getApp();
      const jobId = await submitEcho('hi');

      const dismissed = await app.inject({ method: 'DELETE', url: `/jobs/${jobId}` });
      expect(dismissed.statusCode).toBe(200);
      expect(dismissed.json()).toMatchObject({ jobID: jobId, status: 'dismissed', message: 'Job dismissed' });

      const again = await app.inject({ method: 'DELETE', url: `/jobs/${jobId}` });
      expect(again.statusCode).toBe(200);

      const results = await app.inject({ method: 'GET', url: `/jobs/${jobId}/results` });
      expect(results.statusCode).toBe(410);
      expect(results.json().detail).toBe(`Job ${jobId} was dismissed`);
    });

    it('refuses to dismiss a finished job', async () => {
      const app = server.getApp();
      const jobId = await submitEcho('hi');
      const runtime = server.getRuntime();
      const pool = runtime.createWorkerPool({ workerId: 'test-worker' });
      await pool.tick();
      await pool.drain();

      const response = await app.inject({ method: 'DELETE', url: `/jobs/${jobId}` });
      expect(response.statusCode).toBe(409);
      expect(response.json().title).toBe('JOB_NOT_DISMISSABLE');
    });

    it('lists jobs', async () => {
      const a = await submitEcho('a');
      const b = await submitEcho('b');

      const response = await server.getApp().inject({ method: 'GET', url: '/jobs' });
      const ids = response.json().jobs.map((job: { jobID: string }) => job.jobID).sort();
      expect(ids).toEqual([a, b].sort());
    });

    it('answers unknown jobs with no-such-job', async () => {
      const response = await server.getApp().inject({ method: 'GET', url: '/jobs/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ type: `${OGC_EXCEPTIONS}/no-such-job`, detail: 'Job missing not found' });
    });

    it('answers unknown routes with a problem body', async () => {
      const response = await server.getApp().inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        type: 'about:blank',
        title: 'NOT_FOUND',
        status: 404,
        detail: 'Route GET /nope not found'
      });
    });
  });

  describe('internal faults', () => {
    class BrokenStore extends MemoryKeyValueStore {
      broken = false;

      async get(key: string): Promise<string | null> {
        if (this.broken) throw new StoreError('disk gone');
        return super.get(key);
      }
    }

    it('hides store failures behind a generic message', async () => {
      const store = new BrokenStore();
      const server = await startTestServer({ store });
      try {
        store.broken = true;
        const response = await server.getApp().inject({ method: 'GET', url: '/jobs/some-job' });

        expect(response.statusCode).toBe(500);
        expect(response.json()).toEqual({
          type: 'about:blank',
          title: 'LIBRARY_ERROR',
          status: 500,
          detail: 'Internal server error'
        });
      } finally {
        await server.stop();
      }
    });
  });

  describe('boot', () => {
    it('fails closed without store configuration', async () => {
      const server = new ProcwayServer({ env: { PROCWAY_LOG_LEVEL: 'silent' } });
      await expect(server.init()).rejects.toThrow('Missing PROCWAY_STORE_BACKEND (MEMORY|SQLITE).');
      await server.stop();
    });
  });
});
