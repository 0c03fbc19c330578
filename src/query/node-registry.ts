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

import { CPI, DerivedRatio, IPC } from './derived-ratio';
import { Accumulate, ArithmeticMean, GeometricMean, HarmonicMean } from './functions';
import { SlidingArithmeticMean, SlidingGeometricMean, SlidingHarmonicMean, SlidingSum } from './sliding-window';
import { BinaryNode, Constant, FieldValue, isValueNode, type Operand, type ValueNode } from './value-node';

/**
 * Kind of value a factory parameter accepts:
 * - `operand`: a node, a field name string or a number (boxed by the node)
 * - `string`: a string literal
 * - `number`: a numeric literal
 */
export type ParameterKind = 'operand' | 'string' | 'number';

export interface ParameterSpec {
    name: string;
    kind: ParameterKind;
    optional?: boolean;
}

/** Arguments of one call, bound to parameter names and checked against their kinds. */
export class BoundArguments {
    constructor(private readonly values: ReadonlyMap<string, Operand>) {}

    public has(name: string): boolean {
        return this.values.has(name);
    }

    public operand(name: string): Operand {
        const value = this.values.get(name);
        if (value === undefined) {
            throw new TypeError(`Missing argument '${name}'`);
        }
        return value;
    }

    public string(name: string): string {
        const value = this.operand(name);
        if (typeof value !== 'string') {
            throw new TypeError(`Argument '${name}' must be a string`);
        }
        return value;
    }

    public number(name: string): number {
        const value = this.operand(name);
        if (typeof value !== 'number') {
            throw new TypeError(`Argument '${name}' must be a number`);
        }
        return value;
    }

    public optionalNumber(name: string): number | undefined {
        return this.has(name) ? this.number(name) : undefined;
    }
}

export interface NodeFactory {
    readonly parameters: readonly ParameterSpec[];
    create(args: BoundArguments): ValueNode;
}

export type NodeRegistry = ReadonlyMap<string, NodeFactory>;

export type ExtraNames = Readonly<Record<string, NodeFactory>> | ReadonlyMap<string, NodeFactory>;

export function defineNode(parameters: readonly ParameterSpec[], create: (args: BoundArguments) => ValueNode): NodeFactory {
    return { parameters, create };
}

export function acceptsKind(kind: ParameterKind, value: Operand): boolean {
    switch (kind) {
        case 'operand':
            return typeof value === 'string' || typeof value === 'number' || isValueNode(value);
        case 'string':
            return typeof value === 'string';
        case 'number':
            return typeof value === 'number';
    }
}

const param: ParameterSpec = { name: 'param', kind: 'operand' };
const length: ParameterSpec = { name: 'length', kind: 'number' };
const defaultValue: ParameterSpec = { name: 'default', kind: 'number', optional: true };

const binary = (operator: BinaryNode['operator']): NodeFactory => defineNode(
    [{ name: 'lhs', kind: 'operand' }, { name: 'rhs', kind: 'operand' }],
    args => new BinaryNode(operator, args.operand('lhs'), args.operand('rhs')),
);

const fieldValue = defineNode(
    [{ name: 'attr', kind: 'string' }, defaultValue],
    args => new FieldValue(args.string('attr'), args.optionalNumber('default')),
);

const accumulate = defineNode(
    [param, { name: 'start', kind: 'number', optional: true }],
    args => new Accumulate(args.operand('param'), args.optionalNumber('start')),
);
const arithmeticMean = defineNode([param], args => new ArithmeticMean(args.operand('param')));
const geometricMean = defineNode([param], args => new GeometricMean(args.operand('param')));
const harmonicMean = defineNode([param], args => new HarmonicMean(args.operand('param')));

const slidingArithmeticMean = defineNode([param, length], args => new SlidingArithmeticMean(args.operand('param'), args.number('length')));
const slidingGeometricMean = defineNode([param, length], args => new SlidingGeometricMean(args.operand('param'), args.number('length')));
const slidingHarmonicMean = defineNode([param, length], args => new SlidingHarmonicMean(args.operand('param'), args.number('length')));

const BUILTIN_ENTRIES: ReadonlyArray<[string, NodeFactory]> = [
    ['Add', binary('+')],
    ['Sub', binary('-')],
    ['Mul', binary('*')],
    ['Div', binary('/')],
    ['Constant', defineNode([{ name: 'constant', kind: 'number' }], args => new Constant(args.number('constant')))],
    ['LogValue', fieldValue],
    ['LV', fieldValue],
    ['DerivedRatio', defineNode(
        [
            { name: 'base', kind: 'string' },
            { name: 'numerator', kind: 'string' },
            { name: 'denominator', kind: 'string' },
            defaultValue,
        ],
        args => new DerivedRatio(args.string('base'), args.string('numerator'), args.string('denominator'), args.optionalNumber('default')),
    )],
    ['IPC', defineNode([{ name: 'attr', kind: 'string' }, defaultValue], args => new IPC(args.string('attr'), args.optionalNumber('default')))],
    ['CPI', defineNode([{ name: 'attr', kind: 'string' }, defaultValue], args => new CPI(args.string('attr'), args.optionalNumber('default')))],
    ['Accumulate', accumulate],
    ['AC', accumulate],
    ['ArithmeticMean', arithmeticMean],
    ['AMean', arithmeticMean],
    ['GeometricMean', geometricMean],
    ['GMean', geometricMean],
    ['HarmonicMean', harmonicMean],
    ['HMean', harmonicMean],
    ['SlidingSum', defineNode([param, length], args => new SlidingSum(args.operand('param'), args.number('length')))],
    ['SlidingArithmeticMean', slidingArithmeticMean],
    ['SlidingAMean', slidingArithmeticMean],
    ['SlidingGeometricMean', slidingGeometricMean],
    ['SlidingGMean', slidingGeometricMean],
    ['SlidingHarmonicMean', slidingHarmonicMean],
    ['SlidingHMean', slidingHarmonicMean],
];

function isRegistryMap(names: ExtraNames): names is ReadonlyMap<string, NodeFactory> {
    return names instanceof Map;
}

/** Built-in node constructors, assembled once. */
export const DEFAULT_NODE_REGISTRY: NodeRegistry = new Map(BUILTIN_ENTRIES);

/**
 * Registry of the built-ins plus caller-supplied names. Extra names shadow
 * built-ins of the same name.
 */
export function createNodeRegistry(extraNames?: ExtraNames, base: NodeRegistry = DEFAULT_NODE_REGISTRY): NodeRegistry {
    if (!extraNames) {
        return base;
    }
    const registry = new Map(base);
    const entries = isRegistryMap(extraNames) ? [...extraNames.entries()] : Object.entries(extraNames);
    for (const [name, factory] of entries) {
        registry.set(name, factory);
    }
    return registry;
}
