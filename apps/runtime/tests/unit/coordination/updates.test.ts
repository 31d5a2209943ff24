import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CoordinationState } from "../../../src/coordination/state.js";
import { UpdateScheduler, type UpdateTarget } from "../../../src/coordination/updates.js";
import { createDefaultCatalog, MessageTypes } from "../../../src/protocol/catalog.js";
import { backpressure, SEND_OK, sendFailed, type SendResult } from "../../../src/protocol/errors.js";
import { batchCodec, textCodec } from "../../../src/protocol/payloads.js";
import type { SurfaceRole } from "../../../src/protocol/roles.js";
import { createMessage, type Message } from "../../../src/protocol/types.js";

class FakeTarget implements UpdateTarget {
  readonly queue: Message[] = [];
  result: SendResult = SEND_OK;

  constructor(
    readonly id: string,
    readonly role: SurfaceRole,
  ) {}

  send(message: Message): SendResult {
    if (!this.result.ok) return this.result;
    this.queue.push(message);
    return SEND_OK;
  }

  sendReplacing(message: Message): SendResult {
    const index = this.queue.findIndex((queued) => queued.type === message.type);
    if (index === -1) return this.send(message);
    this.queue[index] = message;
    return SEND_OK;
  }

  hasPending(type: string): boolean {
    return this.queue.some((queued) => queued.type === type);
  }

  /** Pretend the queue was written out. */
  drain(): Message[] {
    return this.queue.splice(0);
  }
}

function theme(name: string): Message {
  return createMessage(MessageTypes.ThemeChanged, textCodec.encode(name));
}

function output(text: string): Message {
  return createMessage(MessageTypes.TerminalOutput, textCodec.encode(text));
}

function batchTexts(message: Message | undefined): string[] {
  if (message === undefined) return [];
  return batchCodec.decode(message.payload).items.map((item) => textCodec.decode(item));
}

function setup(batchMaxItems = 8) {
  const state = new CoordinationState();
  const onFlushRejected = vi.fn();
  const scheduler = new UpdateScheduler(createDefaultCatalog(), state, {
    flushIntervalMs: 16,
    batchMaxItems,
    post: (task) => task(),
    onFlushRejected,
  });
  return { state, scheduler, onFlushRejected };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("UpdateScheduler: normal types", () => {
  it("queue every message", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_p", "primary");
    const notice = createMessage(MessageTypes.Notice);

    expect(scheduler.deliver(target, notice)).toEqual({ status: "queued" });
    expect(scheduler.deliver(target, notice)).toEqual({ status: "queued" });
    expect(target.queue).toHaveLength(2);
  });

  it("report a rejected send", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_p", "primary");
    target.result = sendFailed(backpressure("sf_p", 1));

    expect(scheduler.deliver(target, createMessage(MessageTypes.Notice))).toEqual({
      status: "rejected",
      error: backpressure("sf_p", 1),
    });
  });
});

describe("UpdateScheduler: replaceable types", () => {
  it("suppress a payload the surface already has", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_d", "debug");

    expect(scheduler.deliver(target, theme("dark"))).toEqual({ status: "queued" });
    target.drain();
    expect(scheduler.deliver(target, theme("dark"))).toEqual({ status: "suppressed" });
    expect(target.queue).toEqual([]);
  });

  it("send a changed payload", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_d", "debug");
    scheduler.deliver(target, theme("dark"));
    target.drain();

    expect(scheduler.deliver(target, theme("light"))).toEqual({ status: "queued" });
  });

  it("coalesce with a queued message of the same type", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_d", "debug");
    scheduler.deliver(target, theme("dark"));
    scheduler.deliver(target, createMessage(MessageTypes.Notice));
    scheduler.deliver(target, theme("light"));
    expect(scheduler.deliver(target, theme("dark"))).toEqual({ status: "queued" });

    expect(target.queue.map((message) => message.type)).toEqual([
      MessageTypes.ThemeChanged,
      MessageTypes.Notice,
    ]);
    expect(target.queue[0] && textCodec.decode(target.queue[0].payload)).toBe("dark");
  });

  it("track each instance of a role separately", () => {
    const { scheduler } = setup();
    const first = new FakeTarget("sf_f1", "floating");
    const second = new FakeTarget("sf_f2", "floating");
    scheduler.deliver(first, theme("dark"));
    first.drain();

    expect(scheduler.deliver(second, theme("dark"))).toEqual({ status: "queued" });
    expect(scheduler.deliver(first, theme("dark"))).toEqual({ status: "suppressed" });
  });
});

describe("UpdateScheduler: high-frequency types", () => {
  it("batch items until the flush interval", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_t", "terminal");

    for (const text of ["a", "b", "c"]) {
      expect(scheduler.deliver(target, output(text))).toEqual({ status: "batched" });
    }
    expect(target.queue).toEqual([]);
    expect(scheduler.scheduled).toBe(1);

    vi.advanceTimersByTime(16);

    expect(target.queue).toHaveLength(1);
    const batch = target.queue[0];
    expect(batch?.type).toBe(MessageTypes.Batch);
    expect(batch?.targetRole).toBe("terminal");
    expect(batch && batchCodec.decode(batch.payload).type).toBe(MessageTypes.TerminalOutput);
    expect(batchTexts(batch)).toEqual(["a", "b", "c"]);
    expect(scheduler.scheduled).toBe(0);
  });

  it("flush early when a batch is full", () => {
    const { scheduler } = setup(2);
    const target = new FakeTarget("sf_t", "terminal");

    scheduler.deliver(target, output("a"));
    scheduler.deliver(target, output("b"));

    expect(batchTexts(target.queue[0])).toEqual(["a", "b"]);
    expect(scheduler.scheduled).toBe(0);
  });

  it("keep one batch per type", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_p", "primary");
    scheduler.deliver(target, output("a"));
    scheduler.deliver(target, createMessage(MessageTypes.EditorEdit, new Uint8Array([1])));

    scheduler.flush("sf_p");

    expect(target.queue.map((message) => batchCodec.decode(message.payload).type)).toEqual([
      MessageTypes.TerminalOutput,
      MessageTypes.EditorEdit,
    ]);
    expect(scheduler.scheduled).toBe(0);
  });

  it("drop pending items on cancel", () => {
    const { scheduler } = setup();
    const target = new FakeTarget("sf_t", "terminal");
    scheduler.deliver(target, output("a"));
    scheduler.deliver(target, output("b"));

    expect(scheduler.cancel("sf_t")).toBe(2);
    vi.advanceTimersByTime(100);

    expect(target.queue).toEqual([]);
  });

  it("report a batch that could not be queued", () => {
    const { scheduler, onFlushRejected } = setup();
    const target = new FakeTarget("sf_t", "terminal");
    scheduler.deliver(target, output("a"));
    target.result = sendFailed(backpressure("sf_t", 4));

    vi.advanceTimersByTime(16);

    expect(onFlushRejected).toHaveBeenCalledWith(
      target,
      MessageTypes.TerminalOutput,
      backpressure("sf_t", 4),
    );
  });

  it("run flushes through the posted task runner", () => {
    const state = new CoordinationState();
    const posted: Array<() => void> = [];
    const scheduler = new UpdateScheduler(createDefaultCatalog(), state, {
      flushIntervalMs: 16,
      batchMaxItems: 8,
      post: (task) => posted.push(task),
    });
    const target = new FakeTarget("sf_t", "terminal");
    scheduler.deliver(target, output("a"));

    vi.advanceTimersByTime(16);
    expect(target.queue).toEqual([]);
    expect(posted).toHaveLength(1);

    posted[0]?.();
    expect(batchTexts(target.queue[0])).toEqual(["a"]);
  });
});
