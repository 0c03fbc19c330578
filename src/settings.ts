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

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'off'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const BUILD_STATS_ENABLED = false;

const globalOverrides = globalThis as unknown as {
    __STATS_QUERY_LOG_LEVEL__?: LogLevel;
    __STATS_QUERY_BUILD_STATS__?: boolean;
};

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function envLogLevel(): LogLevel | undefined {
    const value = process.env.STATS_QUERY_LOG_LEVEL?.trim().toLowerCase();
    return isLogLevel(value) ? value : undefined;
}

function envFlag(name: string): boolean | undefined {
    const value = process.env[name]?.trim().toLowerCase();
    if (value === undefined || value === '') {
        return undefined;
    }
    return value === '1' || value === 'true' || value === 'on';
}

export const logLevel: LogLevel = globalOverrides.__STATS_QUERY_LOG_LEVEL__ ?? envLogLevel() ?? DEFAULT_LOG_LEVEL;
export const buildStatsEnabled: boolean = globalOverrides.__STATS_QUERY_BUILD_STATS__ ?? envFlag('STATS_QUERY_BUILD_STATS') ?? BUILD_STATS_ENABLED;
