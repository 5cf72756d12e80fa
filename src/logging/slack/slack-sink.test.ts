/**
 * Unit tests for Slack sink
 */

import { createSlackSink } from './slack-sink';

import type { MockInstance } from 'vitest';

import type { HttpPost, SlackSinkConfig, TimerAPI } from '../types';

interface PendingTimer {
  ms: number;
  callback: () => void;
  cancelled: boolean;
}

function createFakeTimers() {
  const pending: PendingTimer[] = [];
  const api: TimerAPI = {
    set: function(ms, callback) {
      const timer: PendingTimer = { ms: ms, callback: callback, cancelled: false };
      pending.push(timer);
      return { cancel: function() { timer.cancelled = true; } };
    }
  };
  function fireNext(): number {
    const timer = pending.shift();
    if (!timer) throw new Error('no timer scheduled');
    if (!timer.cancelled) timer.callback();
    return timer.ms;
  }
  return { api: api, pending: pending, fireNext: fireNext };
}

function flush(): Promise<void> {
  return new Promise(function(resolve) { setImmediate(resolve); });
}

const OK = { ok: true, status: 200, statusText: 'OK' };
const FAIL = { ok: false, status: 500, statusText: 'Server Error' };

function baseConfig(overrides: Partial<SlackSinkConfig> = {}): SlackSinkConfig {
  return {
    enabled: true,
    webhookUrl: 'https://hooks.example.test/test-secret',
    bufferSize: 10,
    retryDelayMs: 1000,
    maxRetries: 3,
    ...overrides
  };
}

describe('createSlackSink', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe('initialize', () => {
    it('should report disabled sink', async () => {
      const post = vi.fn<HttpPost>();
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig({ enabled: false }));

      expect(await sink.initialize()).toEqual({ success: true, message: 'Slack disabled' });
      expect(sink.isInitialized()).toBe(true);
    });

    it('should flag a missing webhook URL', async () => {
      const post = vi.fn<HttpPost>();
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig({ webhookUrl: null }));

      expect(await sink.initialize()).toEqual({ success: false, message: 'Slack enabled but no webhook URL configured' });
    });

    it('should confirm a configured webhook', async () => {
      const post = vi.fn<HttpPost>();
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig());

      expect(await sink.initialize()).toEqual({ success: true, message: 'Slack webhook configured' });
    });
  });

  describe('write', () => {
    it('should post message as JSON text payload', async () => {
      const post = vi.fn<HttpPost>().mockResolvedValue(OK);
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig());

      sink.write('⚠️ [WARNING]  TRIP pump1');
      await flush();

      expect(post).toHaveBeenCalledWith('https://hooks.example.test/test-secret', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"text":"⚠️ [WARNING]  TRIP pump1"}'
      });
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should do nothing when disabled', () => {
      const post = vi.fn<HttpPost>();
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig({ enabled: false }));

      sink.write('ignored');

      expect(post).not.toHaveBeenCalled();
    });

    it('should buffer a failed message and retry after the initial delay', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValueOnce(FAIL).mockResolvedValue(OK);
      const sink = createSlackSink(post, timers.api, baseConfig());

      sink.write('first');
      await flush();

      expect(sink.getBufferSize()).toBe(1);
      expect(timers.pending).toHaveLength(1);

      expect(timers.fireNext()).toBe(1000);
      await flush();

      expect(post).toHaveBeenCalledTimes(2);
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should double the delay between failed retries', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValue(FAIL);
      const sink = createSlackSink(post, timers.api, baseConfig({ maxRetries: 5 }));

      sink.write('stuck');
      await flush();
      expect(timers.fireNext()).toBe(1000);
      await flush();
      expect(timers.fireNext()).toBe(2000);
      await flush();
      expect(timers.fireNext()).toBe(4000);
    });

    it('should treat a rejected post as a failure', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockRejectedValue(new Error('ECONNRESET'));
      const sink = createSlackSink(post, timers.api, baseConfig());

      sink.write('offline');
      await flush();

      expect(sink.getBufferSize()).toBe(1);
      expect(warn).toHaveBeenCalledWith('Slack send exception: ECONNRESET');
    });

    it('should drop a message after maxRetries', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValue(FAIL);
      const sink = createSlackSink(post, timers.api, baseConfig({ maxRetries: 2 }));

      sink.write('doomed');
      await flush();
      timers.fireNext();
      await flush();
      timers.fireNext();
      await flush();

      expect(sink.getBufferSize()).toBe(0);
      expect(timers.pending).toHaveLength(0);
      expect(warn).toHaveBeenCalledWith('Slack message dropped after 2 retries');
    });

    it('should drop the oldest message when the buffer is full', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValue(FAIL);
      const sink = createSlackSink(post, timers.api, baseConfig({ bufferSize: 2 }));

      sink.write('one');
      await flush();
      sink.write('two');
      sink.write('three');

      expect(sink.getBufferSize()).toBe(2);
      expect(warn).toHaveBeenCalledWith('Slack buffer full, dropping oldest message: one');
    });

    it('should queue new messages behind buffered ones', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValueOnce(FAIL).mockResolvedValue(OK);
      const sink = createSlackSink(post, timers.api, baseConfig());

      sink.write('one');
      await flush();
      sink.write('two');

      expect(post).toHaveBeenCalledTimes(1);
      expect(sink.getBufferSize()).toBe(2);

      timers.fireNext();
      await flush();

      expect(post).toHaveBeenCalledTimes(3);
      expect(post.mock.calls[1][1].body).toBe('{"text":"one"}');
      expect(post.mock.calls[2][1].body).toBe('{"text":"two"}');
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should send each message once when written during a retry', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValueOnce(FAIL).mockResolvedValue(OK);
      const sink = createSlackSink(post, timers.api, baseConfig());

      sink.write('A');
      await flush();
      timers.fireNext();
      sink.write('B');

      expect(post).toHaveBeenCalledTimes(2);
      expect(timers.pending).toHaveLength(0);

      await flush();

      expect(post.mock.calls.map(function(call) { return call[1].body; }))
        .toEqual(['{"text":"A"}', '{"text":"A"}', '{"text":"B"}']);
      expect(timers.pending).toHaveLength(0);
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should hold a new message until the send in flight completes', async () => {
      let settle: (response: Awaited<ReturnType<HttpPost>>) => void = function() {
        throw new Error('send not started');
      };
      const post = vi.fn<HttpPost>()
        .mockImplementationOnce(function() {
          return new Promise<Awaited<ReturnType<HttpPost>>>(function(resolve) { settle = resolve; });
        })
        .mockResolvedValue(OK);
      const sink = createSlackSink(post, createFakeTimers().api, baseConfig());

      sink.write('first');
      sink.write('second');

      expect(post).toHaveBeenCalledTimes(1);

      settle(OK);
      await flush();

      expect(post.mock.calls.map(function(call) { return call[1].body; }))
        .toEqual(['{"text":"first"}', '{"text":"second"}']);
      expect(sink.getBufferSize()).toBe(0);
    });
  });

  describe('close', () => {
    it('should cancel a pending retry and ignore later writes', async () => {
      const timers = createFakeTimers();
      const post = vi.fn<HttpPost>().mockResolvedValue(FAIL);
      const sink = createSlackSink(post, timers.api, baseConfig());

      sink.write('one');
      await flush();
      sink.close();
      sink.write('two');

      expect(timers.pending[0].cancelled).toBe(true);
      expect(post).toHaveBeenCalledTimes(1);
    });
  });
});
