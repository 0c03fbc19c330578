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

import { QueryBuildError } from '../errors';
import { MapStatsDump } from '../stats-dump/stats-dump';
import { IPC } from './derived-ratio';
import { Accumulate, HarmonicMean } from './functions';
import { createNodeRegistry, defineNode } from './node-registry';
import { build, QueryBuilder } from './query-builder';
import { SlidingSum } from './sliding-window';
import { Constant, FieldValue, mul } from './value-node';

const dump = new MapStatsDump({
    host_seconds: 120,
    sim_seconds: 2,
    a: 6,
    b: 3,
    'system.cpu.committedInsts': 300,
    'system.cpu.numCycles': 100,
});

function buildError(expression: string, extra?: Parameters<typeof build>[1]): QueryBuildError {
    try {
        build(expression, extra);
    } catch (error) {
        if (error instanceof QueryBuildError) {
            return error;
        }
        throw error;
    }
    throw new Error(`Expected '${expression}' to fail`);
}

describe('query-builder', () => {
    describe('build', () => {
        it.each([
            { expression: 'LV("host_seconds") / LV("sim_seconds")', text: '(LV("host_seconds") / LV("sim_seconds"))', value: 60 },
            { expression: 'LV("host_seconds") / "sim_seconds"', text: '(LV("host_seconds") / LV("sim_seconds"))', value: 60 },
            { expression: 'LV(\'host_seconds\') + 1.0', text: '(LV("host_seconds") + 1)', value: 121 },
            { expression: '(LV("a") - LV("b")) * 2', text: '((LV("a") - LV("b")) * 2)', value: 6 },
            { expression: 'LV("a") - LV("b") * 2', text: '(LV("a") - (LV("b") * 2))', value: 0 },
            { expression: 'LogValue("missing", default=-1)', text: 'LV("missing", default=-1)', value: -1 },
            { expression: 'Add("a", 1)', text: '(LV("a") + 1)', value: 7 },
            { expression: 'Div(Mul("a", "b"), Sub("a", "b"))', text: '((LV("a") * LV("b")) / (LV("a") - LV("b")))', value: 6 },
            { expression: 'IPC("system.cpu")', text: 'IPC("system.cpu")', value: 3 },
            { expression: 'CPI("system.cpu", default=0)', text: 'CPI("system.cpu", default=0)', value: 100 / 300 },
            { expression: 'DerivedRatio("system.cpu", ".numCycles", ".committedInsts")', text: 'DerivedRatio("system.cpu", ".numCycles", ".committedInsts")', value: 100 / 300 },
            { expression: '"sim_seconds"', text: 'LV("sim_seconds")', value: 2 },
            { expression: '-2', text: '-2', value: -2 },
            { expression: 'Constant(+4) / 2', text: '(4 / 2)', value: 2 },
        ])('builds $expression', ({ expression, text, value }) => {
            const node = build(expression);
            expect(node.describe()).toBe(text);
            expect(node.evaluate(dump)).toBe(value);
        });

        it('resolves aliases to the same node kinds', () => {
            expect(build('AC(LV("a"), start=10)')).toBeInstanceOf(Accumulate);
            expect(build('HMean("a")')).toBeInstanceOf(HarmonicMean);
            expect(build('IPC("system.cpu", 0)')).toBeInstanceOf(IPC);
            expect(build('Constant(3)')).toBeInstanceOf(Constant);
            expect(build('LV("a")')).toBeInstanceOf(FieldValue);
        });

        it('binds window lengths positionally or by keyword', () => {
            const positional = build('SlidingSum("a", 2)');
            const keyword = build('SlidingSum(param=LV("a"), length=2)');
            expect(positional).toBeInstanceOf(SlidingSum);
            expect(positional.describe()).toBe('SlidingSum(LV("a"), length=2)');
            expect(keyword.describe()).toBe(positional.describe());
        });

        it('builds stateful trees that evaluate cumulatively', () => {
            const node = build('Accumulate(LV("a"), start=10) / LV("b")');
            expect(node.evaluate(dump)).toBe(16 / 3);
            expect(node.evaluate(dump)).toBe(22 / 3);
            node.reset();
            expect(node.evaluate(dump)).toBe(16 / 3);
        });

        it('returns independent trees for every call', () => {
            const first = build('AC("a")');
            const second = build('AC("a")');
            first.evaluate(dump);
            expect(first.evaluate(dump)).toBe(12);
            expect(second.evaluate(dump)).toBe(6);
        });
    });

    describe('errors', () => {
        it.each([
            { expression: 'Foo(1)', message: 'Unknown name \'Foo\'' },
            { expression: 'LV("a") + bar', message: 'Unknown name \'bar\'' },
            { expression: 'LV', message: '\'LV\' must be called with arguments' },
            { expression: 'LV(1)', message: 'Argument \'attr\' of LV() must be a string' },
            { expression: 'SlidingSum("a", "b")', message: 'Argument \'length\' of SlidingSum() must be a number' },
            { expression: 'Constant(1, 2)', message: 'Constant() takes at most 1 argument(s), got 2' },
            { expression: 'SlidingSum(LV("x"))', message: 'SlidingSum() is missing argument(s): length' },
            { expression: 'LV("x", fallback=0)', message: 'LV() has no parameter \'fallback\'' },
            { expression: 'LV("x", attr="y")', message: 'LV() got multiple values for \'attr\'' },
            { expression: 'SlidingSum("x", 0)', message: 'SlidingSum(): Window length must be a positive integer, got 0' },
            { expression: '-LV("x")', message: 'Unary \'-\' applies to numeric literals only' },
            { expression: 'LV("x") +', message: 'Unexpected end of expression' },
            { expression: 'process.exit(1)', message: 'Unexpected \'.\' after expression' },
        ])('rejects $expression', ({ expression, message }) => {
            const error = buildError(expression);
            expect(error.kind).toBe('build');
            expect(error.expression).toBe(expression);
            expect(error.diagnostics.map(d => d.message)).toContain(message);
        });

        it('formats the first error with its position', () => {
            expect(() => build('Foo(1)')).toThrow('Cannot build \'Foo(1)\': Unknown name \'Foo\' (at 0..3)');
        });

        it('rejects expressions nested too deeply', () => {
            const expression = `${'('.repeat(20000)}1${')'.repeat(20000)}`;
            const error = buildError(expression);
            expect(error.diagnostics[0]).toEqual({ type: 'error', message: 'Expression nested too deeply', start: 256, end: 257 });
        });

        it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty'])('does not resolve %s from the host', name => {
            expect(buildError(`${name}(1)`).diagnostics[0].message).toBe(`Unknown name '${name}'`);
        });
    });

    describe('extra names', () => {
        const Twice = defineNode([{ name: 'param', kind: 'operand' }], args => mul(args.operand('param'), 2));

        it('makes extra constructors callable', () => {
            const node = build('Twice(LV("a")) + 1', { Twice });
            expect(node.describe()).toBe('((LV("a") * 2) + 1)');
            expect(node.evaluate(dump)).toBe(13);
        });

        it('accepts a map of extra names', () => {
            expect(build('Twice("b")', new Map([['Twice', Twice]])).evaluate(dump)).toBe(6);
        });

        it('lets extra names shadow built-ins', () => {
            expect(build('LV("a")', { LV: Twice }).describe()).toBe('(LV("a") * 2)');
        });

        it('rejects a factory that does not return a node', () => {
            const Bad = defineNode([], () => JSON.parse('{"evaluate": 1}'));
            expect(() => build('Bad() + 1', { Bad })).toThrow('Cannot build \'Bad() + 1\': Bad() did not return a query node (at 0..5)');
        });

        it('does not leak extra names into later builds', () => {
            build('Twice("a")', { Twice });
            expect(buildError('Twice("a")').diagnostics[0].message).toBe('Unknown name \'Twice\'');
        });
    });

    describe('QueryBuilder', () => {
        it('builds against an injected registry only', () => {
            const registry = createNodeRegistry({ Twice: defineNode([{ name: 'param', kind: 'operand' }], args => mul(args.operand('param'), 2)) }, new Map());
            const builder = new QueryBuilder(registry);
            expect(builder.build('Twice(3)').evaluate(dump)).toBe(6);
            expect(() => builder.build('LV("a")')).toThrow(QueryBuildError);
        });
    });
});
