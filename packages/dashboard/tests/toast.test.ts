import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TOAST_DURATION_MS, ToastQueue } from "../src/toast.js";
import type { Toast } from "../src/toast.js";

describe("ToastQueue", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("queues toasts in order with increasing ids", () => {
    const queue = new ToastQueue();
    queue.success("Saved");
    queue.error("Failed");

    expect(queue.list()).toEqual([
      { id: 1, kind: "success", message: "Saved" },
      { id: 2, kind: "error", message: "Failed" },
    ]);
  });

  it("dismisses each toast after five seconds", () => {
    const queue = new ToastQueue();
    queue.success("first");
    vi.advanceTimersByTime(2000);
    queue.success("second");

    vi.advanceTimersByTime(TOAST_DURATION_MS - 2000 - 1);
    expect(queue.list().map((t) => t.message)).toEqual(["first", "second"]);

    vi.advanceTimersByTime(1);
    expect(queue.list().map((t) => t.message)).toEqual(["second"]);

    vi.advanceTimersByTime(2000);
    expect(queue.list()).toEqual([]);
  });

  it("honors a custom duration", () => {
    const queue = new ToastQueue(100);
    queue.error("short");

    vi.advanceTimersByTime(100);
    expect(queue.list()).toEqual([]);
  });

  it("dismisses early and reports unknown ids", () => {
    const queue = new ToastQueue();
    const toast = queue.success("bye");

    expect(queue.dismiss(toast.id)).toBe(true);
    expect(queue.dismiss(toast.id)).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("clears every toast and timer", () => {
    const queue = new ToastQueue();
    queue.success("a");
    queue.error("b");

    queue.clear();

    expect(queue.list()).toEqual([]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("notifies subscribers until they unsubscribe", () => {
    const queue = new ToastQueue();
    const seen: (readonly Toast[])[] = [];
    const subscription = queue.subscribe((toasts) => seen.push(toasts));

    queue.success("one");
    vi.advanceTimersByTime(TOAST_DURATION_MS);
    subscription.unsubscribe();
    queue.success("two");

    expect(seen).toEqual([[{ id: 1, kind: "success", message: "one" }], []]);
  });
});
