// Outbound notification contract for finished AI work

import type { BrokerResult } from '../../shared/types';
import { EVENT_TYPES } from '../../shared/constants';

export interface ResultReadyEvent {
  type: typeof EVENT_TYPES.RESULT_READY;
  content: string;
  result: BrokerResult;
  processingTimeMs: number;
  at: number;
}

/**
 * Receiver of result-ready events, supplied by the host.
 * publish() may return a promise; the broker never awaits it.
 */
export interface ResultEventSink {
  publish(event: ResultReadyEvent): void | Promise<void>;
}

export class NullEventSink implements ResultEventSink {
  publish(_event: ResultReadyEvent): void {
    // no-op
  }
}

/**
 * Fire-and-forget delivery. Sync throws and async rejections are logged, never rethrown.
 */
export function publishSafely(sink: ResultEventSink, event: ResultReadyEvent): void {
  let pending: void | Promise<void>;
  try {
    pending = sink.publish(event);
  } catch (err) {
    console.warn('[ResultEventSink] publish failed:', err);
    return;
  }
  if (pending instanceof Promise) {
    pending.catch((err: unknown) => {
      console.warn('[ResultEventSink] async publish failed:', err);
    });
  }
}

export function resultReadyEvent(content: string, result: BrokerResult, processingTimeMs: number): ResultReadyEvent {
  return {
    type: EVENT_TYPES.RESULT_READY,
    content,
    result,
    processingTimeMs,
    at: Date.now(),
  };
}
