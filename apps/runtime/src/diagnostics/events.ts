/**
 * Diagnostic event publishing: fire-and-forget.
 *
 * Diagnostics describe things that went wrong or changed without being
 * anybody's return value: unroutable messages, codec errors, crashes.
 * A failing sink never blocks the control loop.
 *
 * @module
 */

import { randomUUID } from "node:crypto";

export type DiagnosticTopic =
  | "route.unroutable"
  | "codec.error"
  | "send.backpressure"
  | "sequence.gap"
  | "surface.addressed_terminated"
  | "surface.state_changed"
  | "surface.unexpected_termination"
  | "surface.creation_failed"
  | "layout.restore_failed"
  | "app.exit";

export interface DiagnosticEvent {
  readonly id: string;
  readonly ts: string;
  readonly topic: DiagnosticTopic;
  readonly surfaceId: string | null;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface DiagnosticSink {
  publish(event: DiagnosticEvent): void;
}

export class NoOpDiagnosticSink implements DiagnosticSink {
  publish(_event: DiagnosticEvent): void {}
}

/** Records events for inspection, mostly by tests. */
export class InMemoryDiagnosticSink implements DiagnosticSink {
  public readonly events: DiagnosticEvent[] = [];

  publish(event: DiagnosticEvent): void {
    this.events.push(event);
  }

  ofTopic(topic: DiagnosticTopic): DiagnosticEvent[] {
    return this.events.filter((event) => event.topic === topic);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** Fans events out to several sinks. */
export class CompositeDiagnosticSink implements DiagnosticSink {
  constructor(private readonly sinks: readonly DiagnosticSink[]) {}

  publish(event: DiagnosticEvent): void {
    for (const sink of this.sinks) {
      publishSafely(sink, event);
    }
  }
}

export function emitDiagnostic(
  sink: DiagnosticSink,
  topic: DiagnosticTopic,
  surfaceId: string | null,
  payload: Record<string, unknown> = {},
): DiagnosticEvent {
  const event: DiagnosticEvent = Object.freeze({
    id: randomUUID(),
    ts: new Date().toISOString(),
    topic,
    surfaceId,
    payload: Object.freeze({ ...payload }),
  });
  publishSafely(sink, event);
  return event;
}

function publishSafely(sink: DiagnosticSink, event: DiagnosticEvent): void {
  try {
    sink.publish(event);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[diagnostics] Sink failed on "${event.topic}", event dropped: ${reason}`);
  }
}
