/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export interface WindowOptions {
    /** Source elements to discard before the first batch. */
    start?: number;
    /** Batch size; batches of one are released as the bare element. */
    step?: number;
    /**
     * Stop once this many source elements have been consumed, the skipped
     * ones included (like the stop index of a slice).
     */
    limit?: number;
    /** Trailing source elements withheld from the output. */
    trim?: number;
}

export type Batch<T> = T | T[];

type IteratorState = 'skipping' | 'filling' | 'terminated';

function checkCount(name: string, value: number, min: number): number {
    if (!Number.isInteger(value) || value < min) {
        throw new RangeError(`Window option '${name}' must be an integer >= ${min}, got ${value}`);
    }
    return value;
}

/**
 * Groups a forward-only source into batches of `step` elements.
 *
 * Trailing elements are withheld through a lookahead buffer of `step + trim`
 * elements: a batch is only released while `trim` further elements are known
 * to follow it, so the length of the source never needs to be known. When the
 * source runs dry the buffer decides the final, possibly short, batch:
 * `step - (capacity - buffered)` elements, or nothing when that is not
 * positive.
 */
export class WindowedIterator<T> implements IterableIterator<Batch<T>> {
    public readonly start: number;
    public readonly step: number;
    public readonly limit: number | undefined;
    public readonly trim: number;
    public readonly capacity: number;

    private source: Iterator<T> | undefined;
    private state: IteratorState = 'skipping';
    private buffer: T[] = [];
    private consumed = 0;

    constructor(source: Iterable<T> | Iterator<T>, options: WindowOptions = {}) {
        this.start = checkCount('start', options.start ?? 0, 0);
        this.step = checkCount('step', options.step ?? 1, 1);
        this.limit = options.limit === undefined ? undefined : checkCount('limit', options.limit, 0);
        this.trim = checkCount('trim', options.trim ?? 0, 0);
        if (this.limit !== undefined && this.trim > 0) {
            throw new RangeError('Window options \'limit\' and \'trim\' cannot be combined');
        }
        this.capacity = this.step + this.trim;
        this.source = isIterable(source) ? source[Symbol.iterator]() : source;
    }

    public [Symbol.iterator](): IterableIterator<Batch<T>> {
        return this;
    }

    public isTerminated(): boolean {
        return this.state === 'terminated';
    }

    public next(): IteratorResult<Batch<T>> {
        const batch = this.nextBatch();
        if (batch === undefined) {
            return { done: true, value: undefined };
        }
        return { done: false, value: this.step === 1 && batch.length === 1 ? batch[0] : batch };
    }

    /** Ends iteration early, e.g. on `break` out of a `for...of` loop. */
    public return(): IteratorResult<Batch<T>> {
        const source = this.source;
        this.terminate();
        source?.return?.();
        return { done: true, value: undefined };
    }

    /** Next batch as an array, regardless of the batch size. */
    public nextBatch(): T[] | undefined {
        const source = this.source;
        if (this.state === 'terminated' || source === undefined) {
            return undefined;
        }

        if (this.state === 'skipping') {
            while (this.consumed < this.start) {
                this.consumed++;
                if (source.next().done) {
                    this.terminate();
                    return undefined;
                }
            }
            this.state = 'filling';
        }

        while (this.buffer.length < this.capacity && (this.limit === undefined || this.consumed < this.limit)) {
            const result = source.next();
            if (result.done) {
                break;
            }
            this.consumed++;
            this.buffer.push(result.value);
        }

        if (this.buffer.length < this.capacity) {
            // source exhausted or limit reached: release what is not withheld
            const released = this.step - (this.capacity - this.buffer.length);
            const out = released > 0 ? this.buffer.slice(0, released) : undefined;
            this.terminate();
            return out;
        }

        return this.buffer.splice(0, this.step);
    }

    private terminate(): void {
        this.state = 'terminated';
        this.source = undefined;
        this.buffer = [];
    }
}

function isIterable<T>(source: Iterable<T> | Iterator<T>): source is Iterable<T> {
    return Symbol.iterator in source;
}

export function windowedIterate<T>(source: Iterable<T> | Iterator<T>, options: WindowOptions = {}): WindowedIterator<T> {
    return new WindowedIterator(source, options);
}

/** First element of a batch, the record a report evaluates for it. */
export function firstOfBatch<T>(batch: Batch<T>): T {
    return Array.isArray(batch) ? batch[0] : batch;
}
