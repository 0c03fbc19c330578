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
import { formatNumber, QueryNode } from './value-node';

/**
 * Ratio of two counters sharing a base name, e.g. instructions per cycle of
 * `system.cpu`. A zero denominator is an expected condition (the CPU did not
 * run during the interval): the configured default is returned and the
 * numerator is not read at all.
 */
export class DerivedRatio extends QueryNode {
    constructor(
        public readonly base: string,
        public readonly numeratorSuffix: string,
        public readonly denominatorSuffix: string,
        public readonly defaultValue?: number,
    ) {
        super();
    }

    public evaluate(dump: StatsDump): number {
        const denominator = dump.lookup(this.base + this.denominatorSuffix);
        if (denominator === 0) {
            if (this.defaultValue === undefined) {
                throw new QueryArithmeticError('Division by zero', this.describe());
            }
            return this.defaultValue;
        }
        return dump.lookup(this.base + this.numeratorSuffix) / denominator;
    }

    public describe(): string {
        const args = [this.base, this.numeratorSuffix, this.denominatorSuffix].map(a => JSON.stringify(a));
        return this.formatCall('DerivedRatio', args);
    }

    protected formatCall(name: string, args: string[]): string {
        if (this.defaultValue !== undefined) {
            args.push(`default=${formatNumber(this.defaultValue)}`);
        }
        return `${name}(${args.join(', ')})`;
    }
}

/** Committed instructions per cycle of a CPU. */
export class IPC extends DerivedRatio {
    constructor(cpu: string, defaultValue?: number) {
        super(cpu, '.committedInsts', '.numCycles', defaultValue);
    }

    public override describe(): string {
        return this.formatCall('IPC', [JSON.stringify(this.base)]);
    }
}

/** Cycles per committed instruction of a CPU. */
export class CPI extends DerivedRatio {
    constructor(cpu: string, defaultValue?: number) {
        super(cpu, '.numCycles', '.committedInsts', defaultValue);
    }

    public override describe(): string {
        return this.formatCall('CPI', [JSON.stringify(this.base)]);
    }
}
