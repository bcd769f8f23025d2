/**
 * Toast queue.
 *
 * Success and error messages shown to the user. Each toast dismisses
 * itself after a fixed duration; it can also be dismissed early.
 */

import type { Subscription } from "./state.js";

// =============================================================================
// Types
// =============================================================================

export type ToastKind = "success" | "error";

export interface Toast {
  readonly id: number;
  readonly kind: ToastKind;
  readonly message: string;
}

export type ToastListener = (toasts: readonly Toast[]) => void;

/** Auto-dismiss delay. */
export const TOAST_DURATION_MS = 5000;

// =============================================================================
// Queue
// =============================================================================

export class ToastQueue {
  private readonly toasts: Toast[] = [];
  private readonly timers = new Map<number, ReturnType<typeof setTimeout>>();
  private readonly listeners = new Set<ToastListener>();
  private nextId = 1;

  constructor(private readonly durationMs: number = TOAST_DURATION_MS) {}

  success(message: string): Toast {
    return this.show("success", message);
  }

  error(message: string): Toast {
    return this.show("error", message);
  }

  show(kind: ToastKind, message: string): Toast {
    const toast: Toast = { id: this.nextId++, kind, message };
    this.toasts.push(toast);
    this.timers.set(
      toast.id,
      setTimeout(() => this.dismiss(toast.id), this.durationMs),
    );
    this.emit();
    return toast;
  }

  /**
   * Remove a toast. Returns false when it was already gone.
   */
  dismiss(id: number): boolean {
    const index = this.toasts.findIndex((t) => t.id === id);
    if (index === -1) return false;

    this.toasts.splice(index, 1);
    clearTimeout(this.timers.get(id));
    this.timers.delete(id);
    this.emit();
    return true;
  }

  clear(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    if (this.toasts.length === 0) return;
    this.toasts.length = 0;
    this.emit();
  }

  list(): readonly Toast[] {
    return [...this.toasts];
  }

  subscribe(listener: ToastListener): Subscription {
    this.listeners.add(listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  private emit(): void {
    const snapshot = this.list();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
