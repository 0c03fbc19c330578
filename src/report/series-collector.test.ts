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

import { FieldNotFoundError, QueryBuildError } from '../errors';
import { toStatsDumps } from '../stats-dump/stats-dump';
import { collectSeries, DEFAULT_X_EXPRESSION } from './series-collector';

const dumps = toStatsDumps([
    { sim_insts: 0, sim_seconds: 0.5, host_seconds: 1 },
    { sim_insts: 100, sim_seconds: 1, host_seconds: 2 },
    { sim_insts: 300, sim_seconds: 1.5, host_seconds: 4 },
    { sim_insts: 600, sim_seconds: 2, host_seconds: 5 },
]);

describe('series-collector', () => {
    it('plots against simulated instructions, skipping the first dump', () => {
        expect(DEFAULT_X_EXPRESSION).toBe('LV("sim_insts")');
        expect(collectSeries(dumps, { y: ['LV("sim_seconds")'] })).toEqual({
            x: { label: 'LV("sim_insts")', values: [100, 300, 600] },
            y: [{ label: 'LV("sim_seconds")', values: [1, 1.5, 2] }],
        });
    });

    it('collects several series per batch', () => {
        const result = collectSeries(dumps, {
            x: 'LV("host_seconds")',
            y: ['AC(LV("sim_insts"))', 'LV("sim_insts") / LV("host_seconds")'],
            start: 0,
            step: 2,
        });
        expect(result).toEqual({
            x: { label: 'LV("host_seconds")', values: [1, 4] },
            y: [
                { label: 'Accumulate(LV("sim_insts"))', values: [0, 300] },
                { label: '(LV("sim_insts") / LV("host_seconds"))', values: [0, 75] },
            ],
        });
    });

    it('returns only the x series without y queries', () => {
        expect(collectSeries(dumps, { y: [], trim: 1 })).toEqual({
            x: { label: 'LV("sim_insts")', values: [100, 300] },
            y: [],
        });
    });

    it('propagates build and lookup errors', () => {
        expect(() => collectSeries(dumps, { y: ['Plot(1)'] })).toThrow(QueryBuildError);
        expect(() => collectSeries(dumps, { y: ['LV("missing")'] })).toThrow(FieldNotFoundError);
    });
});
