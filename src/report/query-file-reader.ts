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

import * as yaml from 'yaml';
import { z } from 'zod';
import { QueryFileError } from '../errors';
import { type FileReader, NodeFileReader } from '../file-reader';
import { logger } from '../logger';
import type { ReportOptions } from './query-report';

const ROOT_NODE = 'query';

export type QueryFile = Omit<ReportOptions, 'extraNames'>;

type YamlMap = Record<string, unknown>;

const isYamlMap = (value: unknown): value is YamlMap => typeof value === 'object' && value !== null && !Array.isArray(value);

const nonNegativeInteger = (key: string) => {
    const message = `'${key}' must be a non-negative integer`;
    return z.number({ invalid_type_error: message })
        .int({ message })
        .nonnegative({ message })
        .nullish()
        .transform(value => value ?? undefined);
};

const QueryShape = z.object({
    expressions: z.array(
        z.string({ invalid_type_error: '\'expressions\' must be a non-empty list of strings' }),
        {
            required_error: '\'expressions\' must be a non-empty list of strings',
            invalid_type_error: '\'expressions\' must be a non-empty list of strings',
        },
    ).min(1, '\'expressions\' must be a non-empty list of strings'),
    start: nonNegativeInteger('start'),
    step: nonNegativeInteger('step').refine(step => step !== 0, '\'step\' must be at least 1'),
    limit: nonNegativeInteger('limit'),
    trim: nonNegativeInteger('trim'),
    separator: z.string({ invalid_type_error: '\'separator\' must be a string' }).optional(),
    last: z.boolean({ invalid_type_error: '\'last\' must be a boolean' }).optional(),
    'error-policy': z.enum(['abort', 'skip'], {
        errorMap: () => ({ message: '\'error-policy\' must be \'abort\' or \'skip\'' }),
    }).optional(),
});

const QUERY_KEYS = new Set(Object.keys(QueryShape.shape));

const QueryFileSchema = QueryShape.passthrough().refine(
    query => query.limit === undefined || (query.trim ?? 0) === 0,
    '\'limit\' and \'trim\' cannot be combined',
);

/**
 * Reads report settings from a `*.query.yml` file:
 *
 * ```yaml
 * query:
 *   expressions:
 *     - LV("sim_insts") / LV("sim_seconds")
 *   start: 1
 *   step: 1
 *   trim: 1
 *   separator: ","
 *   last: false
 *   error-policy: skip
 * ```
 */
export class QueryFileReader {
    private queryFile?: QueryFile;

    constructor(private reader: FileReader = new NodeFileReader()) {}

    public hasContents(): boolean {
        return !!this.queryFile;
    }

    public getContents(): QueryFile | undefined {
        return this.queryFile;
    }

    public async parse(filePath: string): Promise<QueryFile> {
        this.queryFile = undefined;
        const fileContents = await this.reader.readFileToString(filePath);
        let fileRoot: unknown;
        try {
            fileRoot = yaml.parse(fileContents);
        } catch (error) {
            throw new QueryFileError(`Malformed YAML (${error instanceof Error ? error.message : String(error)})`, filePath);
        }
        const query = isYamlMap(fileRoot) ? fileRoot[ROOT_NODE] : undefined;
        if (!isYamlMap(query)) {
            throw new QueryFileError('Invalid \'*.query.yml\' file', filePath);
        }
        this.queryFile = this.toQueryFile(query, filePath);
        logger.debug(`Read ${this.queryFile.expressions.length} expression(s) from ${filePath}`);
        return this.queryFile;
    }

    private toQueryFile(query: YamlMap, filePath: string): QueryFile {
        for (const key of Object.keys(query)) {
            if (!QUERY_KEYS.has(key)) {
                logger.warn(`Ignoring unknown key '${key}' in ${filePath}`);
            }
        }

        const result = QueryFileSchema.safeParse(query);
        if (!result.success) {
            throw new QueryFileError(result.error.issues[0]?.message ?? 'Invalid query', filePath);
        }
        const { expressions, start, step, limit, trim, separator, last } = result.data;
        return { expressions, start, step, limit, trim, separator, last, errorPolicy: result.data['error-policy'] };
    }
}
