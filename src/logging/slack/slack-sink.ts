/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to Slack via an incoming webhook for remote monitoring.
 * Features:
 * - Buffers failed messages for retry
 * - Exponential backoff retry (1s, 2s, 4s, 8s... capped at 60s)
 * - Drops oldest messages when buffer full
 * - Slack outages never reach the caller
 */

import { describeError } from '$types/errors';

import type { HttpPost, InitMessage, SlackSink, SlackSinkConfig, TimerAPI, TimerHandle } from '../types';

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Default timer implementation backed by setTimeout
 */
export const NODE_TIMERS: TimerAPI = {
  set: function(ms, callback) {
    const timeout = setTimeout(callback, ms);
    return { cancel: function() { clearTimeout(timeout); } };
  }
};

/**
 * Create a Slack sink with buffering and retry
 *
 * Messages go out in order, one send at a time. A failed message stays at
 * the head of the buffer and is retried with exponential backoff; messages
 * written meanwhile wait behind it.
 *
 * @param post - HTTP POST implementation (global fetch in production)
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(fetch, NODE_TIMERS, {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? null,
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createSlackSink(
  post: HttpPost,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  const webhookUrl = config.webhookUrl;
  let initialized = false;
  let closed = false;
  const buffer: BufferedMessage[] = [];
  let retryTimer: TimerHandle | null = null;
  let inFlight: BufferedMessage | null = null;
  let currentRetryDelay = config.retryDelayMs;

  function sendToSlack(message: BufferedMessage, onSuccess: () => void, onFailure: () => void): void {
    if (!webhookUrl) {
      onFailure();
      return;
    }

    post(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message.text })
    }).then(function(response) {
      if (response.ok) {
        onSuccess();
      } else {
        console.warn('Slack send failed: HTTP ' + response.status + ' ' + response.statusText);
        onFailure();
      }
    }, function(err: unknown) {
      console.warn('Slack send exception: ' + describeError(err));
      onFailure();
    });
  }

  function scheduleRetry(): void {
    if (closed || retryTimer !== null) {
      return;
    }
    retryTimer = timerApi.set(currentRetryDelay, function() {
      retryTimer = null;
      processBuffer();
    });
  }

  function remove(message: BufferedMessage): void {
    const index = buffer.indexOf(message);
    if (index !== -1) {
      buffer.splice(index, 1);
    }
  }

  /**
   * Send the oldest buffered message unless a send or a retry is pending
   */
  function processBuffer(): void {
    if (closed || inFlight !== null || retryTimer !== null) {
      return;
    }
    if (buffer.length === 0) {
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    const message = buffer[0];
    inFlight = message;

    sendToSlack(
      message,
      function onSuccess() {
        inFlight = null;
        remove(message);
        currentRetryDelay = config.retryDelayMs;
        processBuffer();
      },
      function onFailure() {
        inFlight = null;
        message.retries++;

        if (message.retries > config.maxRetries) {
          console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
          remove(message);
          currentRetryDelay = config.retryDelayMs;
          processBuffer();
          return;
        }

        if (buffer.length > 0) {
          scheduleRetry();
          currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
        }
      }
    );
  }

  function enqueue(message: BufferedMessage): void {
    if (buffer.length >= config.bufferSize) {
      const dropped = buffer.shift();
      console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
    }
    buffer.push(message);
    processBuffer();
  }

  async function initialize(): Promise<InitMessage> {
    initialized = true;
    if (!config.enabled) {
      return { success: true, message: 'Slack disabled' };
    }
    if (!webhookUrl) {
      return { success: false, message: 'Slack enabled but no webhook URL configured' };
    }
    return { success: true, message: 'Slack webhook configured' };
  }

  /**
   * Write formatted message to Slack
   * Sent immediately when nothing is pending, otherwise queued
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string): void {
    if (!config.enabled || !webhookUrl || closed) {
      return;
    }

    enqueue({ text: formattedMessage, retries: 0 });
  }

  function close(): void {
    closed = true;
    if (retryTimer !== null) {
      retryTimer.cancel();
      retryTimer = null;
    }
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    isInitialized: function() { return initialized; },
    getBufferSize: function() { return buffer.length; }
  };
}
