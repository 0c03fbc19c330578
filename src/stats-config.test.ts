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

import { BuildStats } from './build-stats';

type GlobalOverrides = {
    __STATS_QUERY_LOG_LEVEL__?: string;
    __STATS_QUERY_BUILD_STATS__?: boolean;
};

const overrides = globalThis as unknown as GlobalOverrides;
const ENV_KEYS = ['STATS_QUERY_LOG_LEVEL', 'STATS_QUERY_BUILD_STATS'];

async function loadConfig() {
    jest.resetModules();
    return {
        settings: await import('./settings'),
        config: await import('./stats-config'),
    };
}

describe('stats-config', () => {
    const savedEnv = ENV_KEYS.map(key => process.env[key]);

    beforeEach(() => {
        ENV_KEYS.forEach(key => delete process.env[key]);
    });

    afterEach(() => {
        delete overrides.__STATS_QUERY_LOG_LEVEL__;
        delete overrides.__STATS_QUERY_BUILD_STATS__;
        ENV_KEYS.forEach((key, index) => {
            const value = savedEnv[index];
            if (value === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = value;
            }
        });
    });

    it('uses defaults when no overrides are provided', async () => {
        const { settings, config } = await loadConfig();

        expect(settings.logLevel).toBe('warn');
        expect(settings.buildStatsEnabled).toBe(false);
        expect(config.buildStats).toBeUndefined();
    });

    it('respects environment variables', async () => {
        process.env.STATS_QUERY_LOG_LEVEL = ' DEBUG ';
        process.env.STATS_QUERY_BUILD_STATS = 'true';

        const { settings, config } = await loadConfig();

        expect(settings.logLevel).toBe('debug');
        expect(config.buildStats?.constructor.name).toBe(BuildStats.name);
    });

    it('ignores unknown log levels', async () => {
        process.env.STATS_QUERY_LOG_LEVEL = 'verbose';
        process.env.STATS_QUERY_BUILD_STATS = '0';

        const { settings, config } = await loadConfig();

        expect(settings.logLevel).toBe('warn');
        expect(config.buildStats).toBeUndefined();
    });

    it('prefers global overrides over the environment', async () => {
        process.env.STATS_QUERY_LOG_LEVEL = 'debug';
        process.env.STATS_QUERY_BUILD_STATS = '1';
        overrides.__STATS_QUERY_LOG_LEVEL__ = 'error';
        overrides.__STATS_QUERY_BUILD_STATS__ = false;

        const { settings, config } = await loadConfig();

        expect(settings.logLevel).toBe('error');
        expect(config.buildStats).toBeUndefined();
    });

    it('recognizes log level names', async () => {
        const { settings } = await loadConfig();

        expect(settings.isLogLevel('trace')).toBe(true);
        expect(settings.isLogLevel('off')).toBe(true);
        expect(settings.isLogLevel('verbose')).toBe(false);
        expect(settings.isLogLevel(3)).toBe(false);
    });
});
