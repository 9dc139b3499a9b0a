// src/lazy_value.ts

// Computes a value on first `get()` and hands every caller the same promise,
// so callers racing on the first access share one computation. A failure is
// cached like a result.
export class LazyValue<T> {
    private promise: Promise<T> | null = null;

    constructor(private readonly compute: () => Promise<T>) {}

    get started(): boolean {
        return this.promise !== null;
    }

    get(): Promise<T> {
        if (!this.promise) {
            this.promise = this.compute();
        }
        return this.promise;
    }
}
