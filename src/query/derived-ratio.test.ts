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

import { FieldNotFoundError, QueryArithmeticError } from '../errors';
import { MapStatsDump } from '../stats-dump/stats-dump';
import { CPI, DerivedRatio, IPC } from './derived-ratio';

const running = new MapStatsDump({
    'system.cpu.committedInsts': 3000,
    'system.cpu.numCycles': 1500,
});

const idle = new MapStatsDump({
    'system.cpu.numCycles': 0,
});

describe('DerivedRatio', () => {
    it('divides the numerator counter by the denominator counter', () => {
        expect(new DerivedRatio('system.cpu', '.committedInsts', '.numCycles').evaluate(running)).toBe(2);
    });

    it('computes IPC and CPI from committed instructions and cycles', () => {
        expect(new IPC('system.cpu').evaluate(running)).toBe(2);
        expect(new CPI('system.cpu').evaluate(running)).toBe(0.5);
    });

    it('returns the default for a zero-cycle dump even without a numerator', () => {
        expect(new IPC('system.cpu', 0).evaluate(idle)).toBe(0);
        expect(new DerivedRatio('system.cpu', '.committedInsts', '.numCycles', -1).evaluate(idle)).toBe(-1);
    });

    it('raises an arithmetic error for a zero denominator without a default', () => {
        expect(() => new IPC('system.cpu').evaluate(idle)).toThrow(QueryArithmeticError);
        expect(() => new IPC('system.cpu').evaluate(idle)).toThrow('Division by zero in IPC("system.cpu")');
    });

    it('propagates missing counters', () => {
        expect(() => new IPC('system.cpu1', 0).evaluate(running)).toThrow(FieldNotFoundError);
        expect(() => new CPI('system.cpu', 0).evaluate(idle)).toThrow(FieldNotFoundError);
    });

    it('describes the base name and the default', () => {
        expect(new IPC('system.cpu_kvm').describe()).toBe('IPC("system.cpu_kvm")');
        expect(new CPI('system.cpu', 0).describe()).toBe('CPI("system.cpu", default=0)');
        expect(new DerivedRatio('l2', '.hits', '.accesses', 1).describe()).toBe('DerivedRatio("l2", ".hits", ".accesses", default=1)');
    });
});
