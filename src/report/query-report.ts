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

import { isStatsQueryError } from '../errors';
import { logger } from '../logger';
import { build } from '../query/query-builder';
import type { ExtraNames } from '../query/node-registry';
import type { ValueNode } from '../query/value-node';
import type { StatsDump } from '../stats-dump/stats-dump';
import { buildStats } from '../stats-config';
import { firstOfBatch, type WindowOptions, windowedIterate } from '../stream/windowed-iterator';

/**
 * What to do when evaluating a batch fails because a field is missing or the
 * arithmetic is undefined. Other errors always propagate.
 */
export type ErrorPolicy = 'abort' | 'skip';

export const DEFAULT_SEPARATOR = ':';

export interface ReportOptions extends WindowOptions {
    expressions: readonly string[];
    separator?: string;
    /** Only emit the row of the final batch. */
    last?: boolean;
    errorPolicy?: ErrorPolicy;
    extraNames?: ExtraNames;
}

/**
 * Evaluates a fixed set of queries over a stream of dumps, one text row per
 * batch. The queries are built up front so a bad expression fails before the
 * stream is touched.
 */
export class QueryReport {
    public readonly queries: readonly ValueNode[];
    private readonly separator: string;
    private readonly errorPolicy: ErrorPolicy;
    private skipped = 0;

    constructor(private readonly options: ReportOptions) {
        this.queries = options.expressions.map(expression => build(expression, options.extraNames));
        this.separator = options.separator ?? DEFAULT_SEPARATOR;
        this.errorPolicy = options.errorPolicy ?? 'abort';
    }

    public header(): string[] {
        return this.queries.map((query, index) => `# ${index}: ${query.describe()}`);
    }

    public getSkipped(): number {
        return this.skipped;
    }

    /** Restores every query to its initial state, for a second pass. */
    public reset(): void {
        for (const query of this.queries) {
            query.reset();
        }
        this.skipped = 0;
    }

    public *rows(source: Iterable<StatsDump>): Generator<string, void, undefined> {
        let lastRow: string | undefined;
        let index = 0;
        for (const batch of windowedIterate(source, this.options)) {
            const values = this.evaluate(firstOfBatch(batch), index++);
            if (values === undefined) {
                continue;
            }
            const row = values.map(v => String(v)).join(this.separator);
            if (this.options.last) {
                lastRow = row;
            } else {
                yield row;
            }
        }
        if (lastRow !== undefined) {
            yield lastRow;
        }
    }

    /** Header lines followed by the rows. */
    public run(source: Iterable<StatsDump>): string[] {
        const lines = [...this.header(), ...this.rows(source)];
        buildStats?.logSummary();
        return lines;
    }

    private evaluate(dump: StatsDump, index: number): number[] | undefined {
        try {
            return this.queries.map(query => query.evaluate(dump));
        } catch (error) {
            if (this.errorPolicy === 'skip' && isStatsQueryError(error)
                && (error.kind === 'field-not-found' || error.kind === 'arithmetic')) {
                this.skipped++;
                logger.warn(`Skipping batch ${index}: ${error.message}`);
                return undefined;
            }
            throw error;
        }
    }
}

export function runReport(source: Iterable<StatsDump>, options: ReportOptions): string[] {
    return new QueryReport(options).run(source);
}
