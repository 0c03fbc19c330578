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

import { QueryArithmeticError } from '../errors';
import { QueryFunction } from './functions';
import type { Operand } from './value-node';

/**
 * Fixed-size circular buffer holding the most recent `length` values.
 * Until it fills up it holds only what was pushed; there is no padding.
 */
export class SlidingWindow {
    private buffer: number[];
    private head = 0;
    private size = 0;

    constructor(public readonly length: number) {
        if (!Number.isInteger(length) || length < 1) {
            throw new RangeError(`Window length must be a positive integer, got ${length}`);
        }
        this.buffer = new Array<number>(length);
    }

    public push(value: number): void {
        this.buffer[this.head] = value;
        this.head = (this.head + 1) % this.length;
        if (this.size < this.length) {
            this.size++;
        }
    }

    /** Values in the window, oldest first. */
    public values(): number[] {
        if (this.size < this.length) {
            return this.buffer.slice(0, this.size);
        }
        return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    }

    public getSize(): number {
        return this.size;
    }

    public clear(): void {
        this.buffer = new Array<number>(this.length);
        this.head = 0;
        this.size = 0;
    }
}

/**
 * Base class for functions over a sliding window of the last `length` values
 * of their parameter.
 */
export abstract class SlidingWindowFunction extends QueryFunction {
    private readonly window: SlidingWindow;

    constructor(param: Operand, public readonly length: number, name: string) {
        super(param, name);
        this.window = new SlidingWindow(length);
    }

    protected apply([x]: number[]): number {
        this.window.push(x);
        return this.evaluateWindow(this.window.values());
    }

    protected override resetState(): void {
        this.window.clear();
    }

    public override describe(): string {
        return `${this.name}(${this.params[0].describe()}, length=${this.length})`;
    }

    protected abstract evaluateWindow(window: number[]): number;
}

const sum = (values: number[]): number => values.reduce((acc, v) => acc + v, 0);

export class SlidingSum extends SlidingWindowFunction {
    constructor(param: Operand, length: number) {
        super(param, length, 'SlidingSum');
    }

    protected evaluateWindow(window: number[]): number {
        return sum(window);
    }
}

export class SlidingArithmeticMean extends SlidingWindowFunction {
    constructor(param: Operand, length: number) {
        super(param, length, 'SlidingArithmeticMean');
    }

    protected evaluateWindow(window: number[]): number {
        return sum(window) / window.length;
    }
}

export class SlidingGeometricMean extends SlidingWindowFunction {
    constructor(param: Operand, length: number) {
        super(param, length, 'SlidingGeometricMean');
    }

    protected evaluateWindow(window: number[]): number {
        const product = window.reduce((acc, v) => acc * v, 1);
        const mean = Math.pow(product, 1 / window.length);
        if (Number.isNaN(mean)) {
            throw new QueryArithmeticError('Root of a negative product', this.describe());
        }
        return mean;
    }
}

export class SlidingHarmonicMean extends SlidingWindowFunction {
    constructor(param: Operand, length: number) {
        super(param, length, 'SlidingHarmonicMean');
    }

    protected evaluateWindow(window: number[]): number {
        if (window.includes(0)) {
            throw new QueryArithmeticError('Division by zero', this.describe());
        }
        return window.length / sum(window.map(v => 1 / v));
    }
}
