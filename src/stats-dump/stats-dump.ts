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

import { FieldNotFoundError } from '../errors';

/**
 * One sampled snapshot of named counters. Implementations are provided by the
 * log reader; the query engine only ever calls `lookup`.
 *
 * `lookup` throws {@link FieldNotFoundError} when the field is absent and no
 * default value was passed.
 */
export interface StatsDump {
    lookup(name: string, defaultValue?: number): number;
}

/**
 * In-memory dump over a plain record or map of counter values.
 */
export class MapStatsDump implements StatsDump {
    private readonly values: Map<string, number>;

    constructor(values: Record<string, number> | Map<string, number> = {}) {
        this.values = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
    }

    public lookup(name: string, defaultValue?: number): number {
        const value = this.values.get(name);
        if (value !== undefined) {
            return value;
        }
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new FieldNotFoundError(name);
    }

    public has(name: string): boolean {
        return this.values.has(name);
    }

    public get size(): number {
        return this.values.size;
    }
}

export function toStatsDumps(records: ReadonlyArray<Record<string, number>>): MapStatsDump[] {
    return records.map(record => new MapStatsDump(record));
}
