import { EventEmitter } from "node:events";
import type { BiometricSample } from "../../lib/scoring/types";

export type SampleBatchListener = (batch: BiometricSample[]) => void;

export interface SampleSubscription {
  subscribe(listener: SampleBatchListener): () => void;
}

/**
 * In-process delivery of newly observed samples. Delivery is at-least-once and
 * batches may interleave metric kinds in any order; listeners must be
 * idempotent and must not block.
 */
export class SampleFeed implements SampleSubscription {
  private readonly emitter = new EventEmitter();

  subscribe(listener: SampleBatchListener): () => void {
    const wrapped = (batch: BiometricSample[]) => {
      try {
        listener(batch);
      } catch (err) {
        console.error("[sample-feed] listener failed:", err);
      }
    };
    this.emitter.on("batch", wrapped);
    return () => {
      this.emitter.off("batch", wrapped);
    };
  }

  publish(batch: BiometricSample[]): void {
    if (batch.length === 0) return;
    this.emitter.emit("batch", batch);
  }

  listenerCount(): number {
    return this.emitter.listenerCount("batch");
  }
}
