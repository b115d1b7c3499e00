import { Signature } from '../domain/types';

/**
 * Bounded set of signatures already processed. Once full, marking a new
 * signature evicts the oldest one, so a signature old enough to have been
 * evicted would be processed again if the scanner ever returned it. The
 * forward-only cursor keeps that from happening in normal operation; size
 * DEDUP_CAPACITY well above the number of signatures a single scan can return.
 */
export class DedupTracker {
    // Set iteration order is insertion order, which is all FIFO eviction needs.
    private readonly signatures = new Set<Signature>();

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Dedup capacity must be a positive integer, got ${capacity}`);
        }
    }

    static from(capacity: number, signatures: Iterable<Signature>): DedupTracker {
        const tracker = new DedupTracker(capacity);
        for (const sig of signatures) tracker.mark(sig);
        return tracker;
    }

    /** Independent copy with the same capacity and eviction order. */
    clone(): DedupTracker {
        return DedupTracker.from(this.capacity, this.signatures);
    }

    seen(signature: Signature): boolean {
        return this.signatures.has(signature);
    }

    mark(signature: Signature): void {
        if (this.signatures.has(signature)) return;

        this.signatures.add(signature);
        while (this.signatures.size > this.capacity) {
            const oldest = this.signatures.values().next();
            if (oldest.done) break;
            this.signatures.delete(oldest.value);
        }
    }

    get size(): number {
        return this.signatures.size;
    }

    /** Oldest first. */
    toArray(): Signature[] {
        return [...this.signatures];
    }
}
