/**
 * Progress events emitted by the Provisioner.
 * @module events
 */

import { EventEmitter } from "node:events";
import type { Artifact, FetchResult } from "./types.js";

// ============================================
// Event Types
// ============================================

type FailedResult = Extract<FetchResult, { status: "failed" }>;

/**
 * Event map defining all provisioning events and their payload types.
 */
export interface ProvisionEventMap {
  /** Emitted before an artifact is checked or fetched */
  "artifact:start": [artifact: Artifact];

  /** Emitted when an artifact's content was placed on disk */
  "artifact:written": [result: Extract<FetchResult, { status: "written" }>];

  /** Emitted when an existing file was kept */
  "artifact:skipped": [result: Extract<FetchResult, { status: "skipped" }>];

  /** Emitted when an artifact could not be installed */
  "artifact:failed": [result: FailedResult];

  /** Emitted when a fatal failure stops the batch */
  "batch:aborted": [result: FailedResult];
}

export type ProvisionEventName = keyof ProvisionEventMap;

// ============================================
// Typed EventEmitter
// ============================================

/**
 * Type-safe EventEmitter for provisioning progress.
 *
 * @example
 * ```typescript
 * provisioner.on("artifact:failed", (result) => {
 *   console.error(`${result.artifact.label}: ${result.cause.message}`);
 * });
 * ```
 */
export class TypedEventEmitter extends EventEmitter {
  on<K extends ProvisionEventName>(
    event: K,
    listener: (...args: ProvisionEventMap[K]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  /**
   * Add a one-time listener for the specified event.
   * The listener is removed after the first invocation.
   */
  once<K extends ProvisionEventName>(
    event: K,
    listener: (...args: ProvisionEventMap[K]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<K extends ProvisionEventName>(
    event: K,
    listener: (...args: ProvisionEventMap[K]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  /**
   * Emit an event with type-safe arguments.
   *
   * @returns True if the event had listeners, false otherwise
   */
  emit<K extends ProvisionEventName>(
    event: K,
    ...args: ProvisionEventMap[K]
  ): boolean {
    return super.emit(event, ...args);
  }

  removeAllListeners(event?: ProvisionEventName): this {
    return super.removeAllListeners(event);
  }

  listenerCount(event: ProvisionEventName): number {
    return super.listenerCount(event);
  }
}
