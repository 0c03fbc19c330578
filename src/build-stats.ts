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

import { performance } from 'node:perf_hooks';
import type { ASTNode } from './query/expression-parser';
import { logger } from './logger';

export class BuildStats {
    private buildMs = 0;
    private buildCalls = 0;
    private buildFailures = 0;
    private nodes = 0;
    private maxNodes = 0;
    private maxDepth = 0;
    private maxDepthKind = '-';
    private kindCounts = new Map<string, number>();
    private opCounts = new Map<string, number>();
    private calleeCounts = new Map<string, number>();

    public reset(): void {
        this.buildMs = 0;
        this.buildCalls = 0;
        this.buildFailures = 0;
        this.nodes = 0;
        this.maxNodes = 0;
        this.maxDepth = 0;
        this.maxDepthKind = '-';
        this.kindCounts.clear();
        this.opCounts.clear();
        this.calleeCounts.clear();
    }

    public hasData(): boolean {
        return this.buildCalls > 0;
    }

    public start(): number {
        return performance.now();
    }

    public endBuild(start: number, failed = false): void {
        this.buildMs += performance.now() - start;
        this.buildCalls += 1;
        if (failed) {
            this.buildFailures += 1;
        }
    }

    public recordParse(ast: ASTNode): void {
        const { nodes, maxDepth, maxDepthKind } = this.collectAstStats(ast);
        this.nodes += nodes;
        this.maxNodes = Math.max(this.maxNodes, nodes);
        if (maxDepth > this.maxDepth) {
            this.maxDepth = maxDepth;
            this.maxDepthKind = maxDepthKind;
        }
    }

    public formatSummary(): string {
        if (!this.hasData()) {
            return '';
        }
        const ms = (value: number) => Math.max(0, Math.floor(value));
        const avg = this.nodes / this.buildCalls;
        return `[build-stats] buildMs=${ms(this.buildMs)} buildCalls=${this.buildCalls} buildFailures=${this.buildFailures} nodes=${this.nodes} avgNodes=${avg.toFixed(1)} maxNodes=${this.maxNodes} maxDepth=${this.maxDepth} maxDepthKind=${this.maxDepthKind} kinds=${this.formatTop(this.kindCounts)} ops=${this.formatTop(this.opCounts)} callees=${this.formatTop(this.calleeCounts)}`;
    }

    public logSummary(): void {
        const summary = this.formatSummary();
        if (summary) {
            logger.trace(summary);
        }
    }

    private bump(map: Map<string, number>, key: string): void {
        map.set(key, (map.get(key) ?? 0) + 1);
    }

    private collectAstStats(node: ASTNode): { nodes: number; maxDepth: number; maxDepthKind: string } {
        let nodes = 0;
        let maxDepth = 0;
        let maxDepthKind = node.kind;
        const visit = (n: ASTNode, depth: number): void => {
            nodes += 1;
            if (depth > maxDepth) {
                maxDepth = depth;
                maxDepthKind = n.kind;
            }
            this.bump(this.kindCounts, n.kind);
            switch (n.kind) {
                case 'UnaryExpression':
                    visit(n.argument, depth + 1);
                    return;
                case 'BinaryExpression':
                    this.bump(this.opCounts, n.operator);
                    visit(n.left, depth + 1);
                    visit(n.right, depth + 1);
                    return;
                case 'CallExpression':
                    this.bump(this.calleeCounts, n.callee.name);
                    for (const arg of n.args) {
                        visit(arg, depth + 1);
                    }
                    for (const keyword of n.keywords) {
                        visit(keyword.value, depth + 1);
                    }
                    return;
                case 'NumberLiteral':
                case 'StringLiteral':
                case 'Identifier':
                case 'ErrorNode':
                    return;
            }
        };
        visit(node, 1);
        return { nodes, maxDepth, maxDepthKind };
    }

    private formatTop(map: Map<string, number>, limit = 5): string {
        if (map.size === 0) {
            return '-';
        }
        return [...map.entries()]
            .sort((a, b) => b[1] - a[1])
            .slice(0, limit)
            .map(([k, v]) => `${k}:${v}`)
            .join(',');
    }
}
