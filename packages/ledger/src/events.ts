import { EventEmitter } from "node:events";
import type { LedgerEvent, LedgerEventOf, LedgerEventType } from "@stakeledger/types";

export type LedgerListener<T extends LedgerEventType> = (event: LedgerEventOf<T>) => void;

/** Receives whatever a ledger listener threw, with the event it was handling. */
export type ListenerErrorHandler = (err: unknown, event: LedgerEvent) => void;

const ANY = "*";
const LISTENER_ERROR = "listenerError";

/**
 * Typed wrapper over EventEmitter. Listeners are called synchronously, after
 * the operation that produced the event has committed. Each subscription
 * returns its own unsubscribe function.
 *
 * Every listener runs in isolation: a throw is routed to the
 * `onListenerError` handlers (or a process warning when there are none) and
 * the remaining listeners still run.
 */
export class LedgerEvents {
  private readonly emitter = new EventEmitter();

  on<T extends LedgerEventType>(type: T, listener: LedgerListener<T>): () => void {
    const guarded = (event: LedgerEventOf<T>) => this.invoke(() => listener(event), event);
    this.emitter.on(type, guarded);
    return () => this.emitter.off(type, guarded);
  }

  onAny(listener: (event: LedgerEvent) => void): () => void {
    const guarded = (event: LedgerEvent) => this.invoke(() => listener(event), event);
    this.emitter.on(ANY, guarded);
    return () => this.emitter.off(ANY, guarded);
  }

  onListenerError(handler: ListenerErrorHandler): () => void {
    this.emitter.on(LISTENER_ERROR, handler);
    return () => this.emitter.off(LISTENER_ERROR, handler);
  }

  emit(event: LedgerEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(ANY, event);
  }

  private invoke(call: () => void, event: LedgerEvent): void {
    try {
      call();
    } catch (err) {
      this.report(err, event);
    }
  }

  private report(err: unknown, event: LedgerEvent): void {
    if (this.emitter.listenerCount(LISTENER_ERROR) > 0) {
      try {
        this.emitter.emit(LISTENER_ERROR, err, event);
        return;
      } catch (handlerErr) {
        err = handlerErr;
      }
    }
    process.emitWarning(`Ledger listener for ${event.type} threw: ${String(err)}`, "LedgerListenerWarning");
  }
}
