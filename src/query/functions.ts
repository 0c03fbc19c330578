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
import type { StatsDump } from '../stats-dump/stats-dump';
import { box, type Operand, QueryNode, type ValueNode } from './value-node';

function isOperandList(params: Operand | readonly Operand[]): params is readonly Operand[] {
    return Array.isArray(params);
}

/**
 * Base class for function nodes. All parameters are evaluated left to right
 * and their results handed to `apply`. Functions are cumulative: `apply` may
 * update internal state, which `resetState` restores to its initial value.
 */
export abstract class QueryFunction extends QueryNode {
    public readonly params: readonly ValueNode[];

    constructor(params: Operand | readonly Operand[], public readonly name: string) {
        super();
        const list = isOperandList(params) ? params : [params];
        this.params = list.map(p => box(p));
    }

    public evaluate(dump: StatsDump): number {
        const values = this.params.map(p => p.evaluate(dump));
        return this.apply(values);
    }

    public describe(): string {
        return `${this.name}(${this.params.map(p => p.describe()).join(',')})`;
    }

    public override reset(): void {
        for (const p of this.params) {
            p.reset();
        }
        this.resetState();
    }

    protected resetState(): void {
        // stateless unless overridden
    }

    protected abstract apply(values: number[]): number;
}

/** Running total of the parameter, seeded with `start`. */
export class Accumulate extends QueryFunction {
    private accumulator: number;

    constructor(param: Operand, public readonly start = 0) {
        super(param, 'Accumulate');
        this.accumulator = start;
    }

    protected apply([x]: number[]): number {
        this.accumulator += x;
        return this.accumulator;
    }

    protected override resetState(): void {
        this.accumulator = this.start;
    }
}

export class ArithmeticMean extends QueryFunction {
    private sum = 0;
    private count = 0;

    constructor(param: Operand) {
        super(param, 'ArithmeticMean');
    }

    protected apply([x]: number[]): number {
        this.sum += x;
        this.count += 1;
        return this.sum / this.count;
    }

    protected override resetState(): void {
        this.sum = 0;
        this.count = 0;
    }
}

/** Keeps the running product in log space, its sign and zero count apart. */
export class GeometricMean extends QueryFunction {
    private logSum = 0;
    private negative = false;
    private zeros = 0;
    private count = 0;

    constructor(param: Operand) {
        super(param, 'GeometricMean');
    }

    protected apply([x]: number[]): number {
        this.count += 1;
        if (x === 0) {
            this.zeros += 1;
        } else {
            this.logSum += Math.log(Math.abs(x));
            this.negative = this.negative !== x < 0;
        }
        if (this.zeros > 0) {
            return 0;
        }
        const magnitude = Math.exp(this.logSum / this.count);
        if (this.negative) {
            if (this.count > 1) {
                throw new QueryArithmeticError('Root of a negative product', this.describe());
            }
            return -magnitude;
        }
        return magnitude;
    }

    protected override resetState(): void {
        this.logSum = 0;
        this.negative = false;
        this.zeros = 0;
        this.count = 0;
    }
}

export class HarmonicMean extends QueryFunction {
    private reciprocalSum = 0;
    private count = 0;

    constructor(param: Operand) {
        super(param, 'HarmonicMean');
    }

    protected apply([x]: number[]): number {
        if (x === 0) {
            throw new QueryArithmeticError('Division by zero', this.describe());
        }
        this.reciprocalSum += 1 / x;
        this.count += 1;
        return this.count / this.reciprocalSum;
    }

    protected override resetState(): void {
        this.reciprocalSum = 0;
        this.count = 0;
    }
}
