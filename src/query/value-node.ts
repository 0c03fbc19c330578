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

import { QueryArithmeticError, QueryTypeError } from '../errors';
import type { StatsDump } from '../stats-dump/stats-dump';

/**
 * A node of a query tree. Nodes are single-owner: stateful nodes mutate their
 * state on every `evaluate`, so one tree must never be shared between two
 * streams (build a second tree instead).
 */
export interface ValueNode {
    evaluate(dump: StatsDump): number;
    describe(): string;
    reset(): void;
}

/** A node, a field name (looked up in each dump) or a constant. */
export type Operand = ValueNode | string | number;

export type BinaryOperator = '+' | '-' | '*' | '/';

export function isValueNode(value: unknown): value is ValueNode {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'evaluate' in value && typeof value.evaluate === 'function'
        && 'describe' in value && typeof value.describe === 'function'
        && 'reset' in value && typeof value.reset === 'function';
}

/**
 * Wraps an operand into a node: strings become field lookups, numbers become
 * constants and nodes are returned as they are.
 */
export function box(value: unknown): ValueNode {
    if (isValueNode(value)) {
        return value;
    }
    if (typeof value === 'string') {
        return new FieldValue(value);
    }
    if (typeof value === 'number') {
        return new Constant(value);
    }
    throw new QueryTypeError(value);
}

export function formatNumber(value: number): string {
    return String(value);
}

/**
 * Base class for the built-in nodes. Adds arithmetic composition so trees can
 * be written in code: `new FieldValue('sim_insts').div('sim_seconds')`.
 */
export abstract class QueryNode implements ValueNode {
    public abstract evaluate(dump: StatsDump): number;
    public abstract describe(): string;

    public reset(): void {
        // stateless by default
    }

    public add(other: Operand): BinaryNode {
        return new BinaryNode('+', this, other);
    }

    public sub(other: Operand): BinaryNode {
        return new BinaryNode('-', this, other);
    }

    public mul(other: Operand): BinaryNode {
        return new BinaryNode('*', this, other);
    }

    public div(other: Operand): BinaryNode {
        return new BinaryNode('/', this, other);
    }

    public toString(): string {
        return this.describe();
    }
}

export class BinaryNode extends QueryNode {
    public readonly left: ValueNode;
    public readonly right: ValueNode;

    constructor(public readonly operator: BinaryOperator, left: Operand, right: Operand) {
        super();
        this.left = box(left);
        this.right = box(right);
    }

    public evaluate(dump: StatsDump): number {
        const lhs = this.left.evaluate(dump);
        const rhs = this.right.evaluate(dump);
        switch (this.operator) {
            case '+':
                return lhs + rhs;
            case '-':
                return lhs - rhs;
            case '*':
                return lhs * rhs;
            case '/':
                if (rhs === 0) {
                    throw new QueryArithmeticError('Division by zero', this.describe());
                }
                return lhs / rhs;
        }
    }

    public describe(): string {
        return `(${this.left.describe()} ${this.operator} ${this.right.describe()})`;
    }

    public override reset(): void {
        this.left.reset();
        this.right.reset();
    }
}

export function add(lhs: Operand, rhs: Operand): BinaryNode {
    return new BinaryNode('+', lhs, rhs);
}

export function sub(lhs: Operand, rhs: Operand): BinaryNode {
    return new BinaryNode('-', lhs, rhs);
}

export function mul(lhs: Operand, rhs: Operand): BinaryNode {
    return new BinaryNode('*', lhs, rhs);
}

export function div(lhs: Operand, rhs: Operand): BinaryNode {
    return new BinaryNode('/', lhs, rhs);
}

export class Constant extends QueryNode {
    constructor(public readonly value: number) {
        super();
    }

    public evaluate(_dump: StatsDump): number {
        return this.value;
    }

    public describe(): string {
        return formatNumber(this.value);
    }
}

/**
 * Looks up a named counter in each dump. Without a default a missing field
 * raises the dump's FieldNotFoundError.
 */
export class FieldValue extends QueryNode {
    constructor(public readonly field: string, public readonly defaultValue?: number) {
        super();
    }

    public evaluate(dump: StatsDump): number {
        return dump.lookup(this.field, this.defaultValue);
    }

    public describe(): string {
        if (this.defaultValue !== undefined) {
            return `LV(${JSON.stringify(this.field)}, default=${formatNumber(this.defaultValue)})`;
        }
        return `LV(${JSON.stringify(this.field)})`;
    }
}
