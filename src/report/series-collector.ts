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

import { build } from '../query/query-builder';
import type { ExtraNames } from '../query/node-registry';
import type { StatsDump } from '../stats-dump/stats-dump';
import { buildStats } from '../stats-config';
import { firstOfBatch, type WindowOptions, windowedIterate } from '../stream/windowed-iterator';

export const DEFAULT_X_EXPRESSION = 'LV("sim_insts")';

export interface Series {
    label: string;
    values: number[];
}

export interface SeriesResult {
    x: Series;
    y: Series[];
}

export interface SeriesOptions extends WindowOptions {
    /** Expression for the x axis; defaults to committed simulated instructions. */
    x?: string;
    y: readonly string[];
    extraNames?: ExtraNames;
}

/**
 * Collects the data points of a plot: one x value and one value per y query
 * for every batch. The first dump is skipped unless `start` says otherwise,
 * since it is usually the statistics reset at the start of a run.
 */
export function collectSeries(source: Iterable<StatsDump>, options: SeriesOptions): SeriesResult {
    const xQuery = build(options.x ?? DEFAULT_X_EXPRESSION, options.extraNames);
    const yQueries = options.y.map(expression => build(expression, options.extraNames));

    const x: Series = { label: xQuery.describe(), values: [] };
    const y: Series[] = yQueries.map(query => ({ label: query.describe(), values: [] }));

    for (const batch of windowedIterate(source, { ...options, start: options.start ?? 1 })) {
        const dump = firstOfBatch(batch);
        x.values.push(xQuery.evaluate(dump));
        yQueries.forEach((query, index) => y[index].values.push(query.evaluate(dump)));
    }
    buildStats?.logSummary();

    return { x, y };
}
