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

import { type Diagnostic, QueryBuildError } from '../errors';
import { logger } from '../logger';
import { buildStats } from '../stats-config';
import { type ASTNode, type BaseNode, type CallExpression, Parser } from './expression-parser';
import {
    acceptsKind,
    BoundArguments,
    createNodeRegistry,
    DEFAULT_NODE_REGISTRY,
    type ExtraNames,
    type NodeRegistry,
} from './node-registry';
import { BinaryNode, box, isValueNode, type Operand, type ValueNode } from './value-node';

/**
 * Turns query text into a node tree. Names resolve only against the registry
 * the builder was created with; anything else is a build error.
 */
export class QueryBuilder {
    private readonly parser = new Parser();
    private diagnostics: Diagnostic[] = [];

    constructor(private readonly registry: NodeRegistry = DEFAULT_NODE_REGISTRY) {}

    public build(expression: string): ValueNode {
        const start = buildStats?.start() ?? 0;
        let failed = true;
        try {
            const { ast, diagnostics } = this.parser.parse(expression);
            buildStats?.recordParse(ast);
            this.diagnostics = diagnostics;
            const root = this.diagnostics.length === 0 ? this.resolve(ast) : undefined;
            if (root === undefined || this.diagnostics.some(d => d.type === 'error')) {
                throw new QueryBuildError(expression, this.diagnostics);
            }
            const node = box(root);
            failed = false;
            logger.debug(`Built query '${expression}' as ${node.describe()}`);
            return node;
        } finally {
            buildStats?.endBuild(start, failed);
        }
    }

    private error(message: string, node: Pick<BaseNode, 'start' | 'end'>): undefined {
        this.diagnostics.push({ type: 'error', message, start: node.start, end: node.end });
        return undefined;
    }

    private resolve(node: ASTNode): Operand | undefined {
        switch (node.kind) {
            case 'NumberLiteral':
                return node.value;
            case 'StringLiteral':
                return node.value;
            case 'Identifier':
                return this.registry.has(node.name)
                    ? this.error(`'${node.name}' must be called with arguments`, node)
                    : this.error(`Unknown name '${node.name}'`, node);
            case 'UnaryExpression': {
                const argument = this.resolve(node.argument);
                if (argument === undefined) {
                    return undefined;
                }
                if (typeof argument !== 'number') {
                    return this.error(`Unary '${node.operator}' applies to numeric literals only`, node);
                }
                return node.operator === '-' ? -argument : argument;
            }
            case 'BinaryExpression': {
                const left = this.resolve(node.left);
                const right = this.resolve(node.right);
                if (left === undefined || right === undefined) {
                    return undefined;
                }
                return new BinaryNode(node.operator, left, right);
            }
            case 'CallExpression':
                return this.resolveCall(node);
            case 'ErrorNode':
                return this.error(node.message, node);
        }
    }

    private resolveCall(call: CallExpression): ValueNode | undefined {
        const name = call.callee.name;
        const factory = this.registry.get(name);
        if (!factory) {
            return this.error(`Unknown name '${name}'`, call.callee);
        }

        const { parameters } = factory;
        const bound = new Map<string, Operand>();
        let ok = true;

        if (call.args.length > parameters.length) {
            ok = false;
            this.error(`${name}() takes at most ${parameters.length} argument(s), got ${call.args.length}`, call);
        }
        call.args.forEach((arg, index) => {
            const value = this.resolve(arg);
            const parameter = parameters.at(index);
            if (value === undefined || !parameter) {
                ok = false;
                return;
            }
            if (!acceptsKind(parameter.kind, value)) {
                ok = false;
                this.error(`Argument '${parameter.name}' of ${name}() must be a ${parameter.kind}`, arg);
                return;
            }
            bound.set(parameter.name, value);
        });

        for (const keyword of call.keywords) {
            const parameter = parameters.find(p => p.name === keyword.name);
            const value = this.resolve(keyword.value);
            if (!parameter) {
                ok = false;
                this.error(`${name}() has no parameter '${keyword.name}'`, keyword);
                continue;
            }
            if (bound.has(parameter.name)) {
                ok = false;
                this.error(`${name}() got multiple values for '${keyword.name}'`, keyword);
                continue;
            }
            if (value === undefined) {
                ok = false;
                continue;
            }
            if (!acceptsKind(parameter.kind, value)) {
                ok = false;
                this.error(`Argument '${parameter.name}' of ${name}() must be a ${parameter.kind}`, keyword.value);
                continue;
            }
            bound.set(parameter.name, value);
        }

        if (!ok) {
            return undefined;
        }
        const missing = parameters.filter(p => !p.optional && !bound.has(p.name)).map(p => p.name);
        if (missing.length > 0) {
            return this.error(`${name}() is missing argument(s): ${missing.join(', ')}`, call);
        }

        let created: unknown;
        try {
            created = factory.create(new BoundArguments(bound));
        } catch (e) {
            return this.error(`${name}(): ${e instanceof Error ? e.message : String(e)}`, call);
        }
        if (!isValueNode(created)) {
            return this.error(`${name}() did not return a query node`, call);
        }
        return created;
    }
}

/**
 * Builds a node tree from query text such as
 * `Accumulate(LV("sim_insts")) / LV("host_seconds")`.
 *
 * @param extraNames additional constructors callable from the expression
 * @throws QueryBuildError on unknown names or malformed text
 */
export function build(expression: string, extraNames?: ExtraNames): ValueNode {
    return new QueryBuilder(createNodeRegistry(extraNames)).build(expression);
}
