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

import { format } from 'node:util';
import { type LogLevel, LOG_LEVELS, logLevel } from './settings';

export interface Logger {
    trace(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string | Error, ...args: unknown[]): void;
}

type Sink = (line: string) => void;

const stderrSink: Sink = line => {
    console.error(line);
};

/**
 * Creates a named logger writing `[level] [name] message` lines to stderr, so
 * report output on stdout stays machine readable.
 */
export function createLogger(name: string, level: LogLevel = logLevel, sink: Sink = stderrSink): Logger {
    const threshold = LOG_LEVELS.indexOf(level);
    const write = (at: Exclude<LogLevel, 'off'>, message: string | Error, args: unknown[]): void => {
        if (LOG_LEVELS.indexOf(at) < threshold) {
            return;
        }
        const text = message instanceof Error ? (message.stack ?? message.message) : message;
        sink(`[${at}] [${name}] ${args.length > 0 ? format(text, ...args) : text}`);
    };
    return {
        trace: (message, ...args) => write('trace', message, args),
        debug: (message, ...args) => write('debug', message, args),
        info: (message, ...args) => write('info', message, args),
        warn: (message, ...args) => write('warn', message, args),
        error: (message, ...args) => write('error', message, args),
    };
}

export const logger = createLogger('Stats Query');
