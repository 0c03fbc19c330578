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

export type StatsQueryErrorKind = 'field-not-found' | 'arithmetic' | 'build' | 'type' | 'query-file';

/**
 * Base class of every error raised by the query engine. The `kind` lets a
 * front end decide per failure whether to abort or to skip a record.
 */
export abstract class StatsQueryError extends Error {
    public abstract readonly kind: StatsQueryErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class FieldNotFoundError extends StatsQueryError {
    public readonly kind = 'field-not-found';

    constructor(public readonly field: string) {
        super(`Field '${field}' not found in stats dump`);
    }
}

export class QueryArithmeticError extends StatsQueryError {
    public readonly kind = 'arithmetic';

    constructor(message: string, public readonly expression: string) {
        super(`${message} in ${expression}`);
    }
}

export interface Diagnostic { type: 'error'|'warning'; message: string; start: number; end: number; }

export class QueryBuildError extends StatsQueryError {
    public readonly kind = 'build';

    constructor(public readonly expression: string, public readonly diagnostics: Diagnostic[]) {
        super(QueryBuildError.formatMessage(expression, diagnostics));
    }

    private static formatMessage(expression: string, diagnostics: Diagnostic[]): string {
        const first = diagnostics.find(d => d.type === 'error') ?? diagnostics[0];
        if (!first) {
            return `Cannot build '${expression}'`;
        }
        return `Cannot build '${expression}': ${first.message} (at ${first.start}..${first.end})`;
    }
}

export class QueryTypeError extends StatsQueryError {
    public readonly kind = 'type';

    constructor(public readonly operand: unknown) {
        super(`Illegal operand type '${operand === null ? 'null' : typeof operand}', expected a node, a field name or a number`);
    }
}

export class QueryFileError extends StatsQueryError {
    public readonly kind = 'query-file';

    constructor(message: string, public readonly filePath: string) {
        super(`${message}: ${filePath}`);
    }
}

export function isStatsQueryError(error: unknown): error is StatsQueryError {
    return error instanceof StatsQueryError;
}
