/**
 * Relays Module - Feedback Tracker Tests
 */
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { RelaySnapshot } from "../schema.js";
import { createRelayTracker } from "../service.js";

const openOnly = (s: RelaySnapshot) => s.open && !s.close;
const bothOff = (s: RelaySnapshot) => !s.open && !s.close;

describe("createRelayTracker", () => {
  const log = pino({ level: "silent" });

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts with both relays off", () => {
    const tracker = createRelayTracker(log);
    expect(tracker.getSnapshot()).toEqual({ open: false, close: false });
  });

  it("keeps only the latest value per relay", () => {
    const tracker = createRelayTracker(log);
    tracker.update("open", true);
    tracker.update("open", false);
    tracker.update("open", true);
    expect(tracker.getSnapshot()).toEqual({ open: true, close: false });
  });

  it("resolves immediately when the predicate already holds", async () => {
    const tracker = createRelayTracker(log);

    const result = await tracker.waitFor(bothOff, { timeoutMs: null });

    expect(result.isOk()).toBe(true);
    expect(tracker.pendingWaits()).toBe(0);
  });

  it("wakes a pending wait once feedback satisfies the predicate", async () => {
    const tracker = createRelayTracker(log);
    const pending = tracker.waitFor(openOnly, { timeoutMs: null });

    tracker.update("close", false);
    expect(tracker.pendingWaits()).toBe(1);

    tracker.update("open", true);
    const result = await pending;

    expect(result._unsafeUnwrap()).toEqual({ open: true, close: false });
    expect(tracker.pendingWaits()).toBe(0);
  });

  it("re-checks the predicate on every update", async () => {
    const tracker = createRelayTracker(log);
    tracker.update("close", true);
    const pending = tracker.waitFor(openOnly, { timeoutMs: null });

    // open on while close still on: not yet
    tracker.update("open", true);
    expect(tracker.pendingWaits()).toBe(1);

    tracker.update("close", false);
    const result = await pending;
    expect(result.isOk()).toBe(true);
  });

  it("times out with the observed snapshot", async () => {
    const tracker = createRelayTracker(log);
    tracker.update("close", true);
    const pending = tracker.waitFor(openOnly, { timeoutMs: 1000 });

    await vi.advanceTimersByTimeAsync(999);
    expect(tracker.pendingWaits()).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "FEEDBACK_TIMEOUT",
      timeoutMs: 1000,
      observed: { open: false, close: true },
    });
    expect(tracker.pendingWaits()).toBe(0);
  });

  it("waits forever without a timeout", async () => {
    const tracker = createRelayTracker(log);
    const pending = tracker.waitFor(openOnly, { timeoutMs: null });

    await vi.advanceTimersByTimeAsync(3_600_000);
    expect(tracker.pendingWaits()).toBe(1);

    tracker.update("open", true);
    expect((await pending).isOk()).toBe(true);
  });

  it("ends the wait when the signal aborts", async () => {
    const tracker = createRelayTracker(log);
    const controller = new AbortController();
    const pending = tracker.waitFor(openOnly, {
      timeoutMs: null,
      signal: controller.signal,
    });

    controller.abort();
    const result = await pending;

    expect(result._unsafeUnwrapErr().type).toBe("WAIT_ABORTED");
    expect(tracker.pendingWaits()).toBe(0);
  });

  it("refuses to wait on an already aborted signal", async () => {
    const tracker = createRelayTracker(log);
    const controller = new AbortController();
    controller.abort();

    const result = await tracker.waitFor(openOnly, {
      timeoutMs: null,
      signal: controller.signal,
    });

    expect(result._unsafeUnwrapErr().type).toBe("WAIT_ABORTED");
  });

  it("tolerates both relays reporting on", () => {
    const tracker = createRelayTracker(log);
    tracker.update("open", true);
    tracker.update("close", true);
    expect(tracker.getSnapshot()).toEqual({ open: true, close: true });
  });
});
