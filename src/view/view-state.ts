/**
 * view-state.ts: Observable view state shared by every view model.
 *
 * One variant is active at a time. Subscribers are called synchronously,
 * once per transition, after the fields that define the new state are set.
 */

import { log } from "../logger.js";

// ─── State ──────────────────────────────────────────────────

export type ViewState =
  | { readonly status: "idle" }
  | { readonly status: "loading" }
  | { readonly status: "loading-more" }
  | { readonly status: "success" }
  | { readonly status: "error"; readonly message: string };

export type ViewStatus = ViewState["status"];

export const IDLE: ViewState = Object.freeze({ status: "idle" });
export const LOADING: ViewState = Object.freeze({ status: "loading" });
export const LOADING_MORE: ViewState = Object.freeze({ status: "loading-more" });
export const SUCCESS: ViewState = Object.freeze({ status: "success" });

export function errorState(message: string): ViewState {
  return Object.freeze({ status: "error", message });
}

// ─── Subscriber list ────────────────────────────────────────

export type StateListener = (state: ViewState) => void;

export abstract class ChangeNotifier {
  private readonly listeners = new Set<StateListener>();
  private current: ViewState = IDLE;

  get state(): ViewState {
    return this.current;
  }

  get errorMessage(): string | null {
    return this.current.status === "error" ? this.current.message : null;
  }

  get isLoading(): boolean {
    return this.current.status === "loading";
  }

  get hasError(): boolean {
    return this.current.status === "error";
  }

  /** Register `listener`; returns a function that removes it. */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: StateListener): void {
    this.listeners.delete(listener);
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  /** Drop every subscriber. Call when the owning UI scope goes away. */
  dispose(): void {
    this.listeners.clear();
  }

  /** Enter `next` and notify. Subclasses set their data fields first. */
  protected transition(next: ViewState): void {
    this.current = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next);
      } catch (err) {
        log.view.error({ err, status: next.status }, "subscriber threw");
      }
    }
  }
}
