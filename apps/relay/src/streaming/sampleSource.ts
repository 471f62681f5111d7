import type { Sample, SampleSource, SourceEvent } from "./types.js";

type Waiter = (event: SourceEvent) => void;

/**
 * Push-driven sample source. An acquisition callback pushes samples in;
 * the relay pulls them out in order.
 *
 * At most `capacity` samples wait for the relay. While the relay is held
 * back by backpressure, pushes beyond that are refused and counted in
 * `rejected`. Events after `end()` or `disconnect()` are ignored.
 */
export class BufferedSampleSource implements SampleSource {
    private buffer: SourceEvent[] = [];
    private waiter: Waiter | null = null;
    private terminated = false;
    private rejectedCount = 0;

    constructor(
        readonly streamId: string,
        readonly capacity: number = 1000
    ) {}

    /**
     * Returns false when the sample was not accepted (buffer full, or the
     * source already terminated).
     */
    push(sample: Omit<Sample, "streamId">): boolean {
        if (this.terminated) return false;
        if (this.waiter === null && this.buffer.length >= this.capacity) {
            this.rejectedCount++;
            return false;
        }
        this.enqueue({ type: "sample", sample: { ...sample, streamId: this.streamId } });
        return true;
    }

    end(): void {
        this.enqueue({ type: "end" });
        this.terminated = true;
    }

    disconnect(error: Error): void {
        this.enqueue({ type: "disconnected", error });
        this.terminated = true;
    }

    get buffered(): number {
        return this.buffer.length;
    }

    /** Samples refused because the buffer was full */
    get rejected(): number {
        return this.rejectedCount;
    }

    next(signal: AbortSignal): Promise<SourceEvent> {
        const ready = this.buffer.shift();
        if (ready) return Promise.resolve(ready);
        if (signal.aborted) return Promise.resolve<SourceEvent>({ type: "end" });

        return new Promise((resolve) => {
            const onAbort = () => {
                this.waiter = null;
                resolve({ type: "end" });
            };
            this.waiter = (event) => {
                signal.removeEventListener("abort", onAbort);
                resolve(event);
            };
            signal.addEventListener("abort", onAbort, { once: true });
        });
    }

    private enqueue(event: SourceEvent): void {
        if (this.terminated) return;
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter(event);
            return;
        }
        this.buffer.push(event);
    }
}

/**
 * Adapt an async iterable of samples. Exhaustion is end-of-stream; a thrown
 * error is a disconnect. An aborted pull resolves `end` without waiting for
 * the iterator.
 */
export function fromAsyncIterable(streamId: string, samples: AsyncIterable<Sample>): SampleSource {
    const iterator = samples[Symbol.asyncIterator]();
    let finished = false;

    return {
        streamId,
        next(signal) {
            if (finished || signal.aborted) return Promise.resolve<SourceEvent>({ type: "end" });

            const pulled = iterator.next().then(
                (result): SourceEvent => {
                    if (result.done) {
                        finished = true;
                        return { type: "end" };
                    }
                    return { type: "sample", sample: result.value };
                },
                (err: unknown): SourceEvent => {
                    finished = true;
                    return {
                        type: "disconnected",
                        error: err instanceof Error ? err : new Error(String(err)),
                    };
                }
            );
            let onAbort = (): void => undefined;
            const aborted = new Promise<SourceEvent>((resolve) => {
                onAbort = () => resolve({ type: "end" });
                signal.addEventListener("abort", onAbort, { once: true });
            });
            return Promise.race([pulled, aborted]).finally(() => {
                signal.removeEventListener("abort", onAbort);
            });
        },
    };
}
