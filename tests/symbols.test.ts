import toml from 'toml';
import { describe, test, expect } from 'vitest';
import { readFixture } from './test-common';
import { symbolTables, translate } from '../src';
import { build_symbol_tables, replace_symbols } from '../src/symbols';


describe('greek letters', () => {
    const data = toml.parse(readFixture('greek-letters.toml'));

    for (const section of ['lowercase', 'uppercase', 'lookalikes']) {
        test(section, function () {
            expect(data[section]).toBeDefined();
            for (const [key, value] of Object.entries(data[section])) {
                expect(symbolTables.greek.get(key)).toBe(value);
                expect(translate(key)).toBe(value);
            }
        });
    }
});


describe('symbol tables', () => {
    test('replace_symbols covers greek, special symbols and infinity', function () {
        expect(replace_symbols('α†∞')).toEqual('\\alpha{\\dagger}\\infty');
    });

    test('keys are also reachable after symbol replacement', function () {
        expect(symbolTables.constants.get('μ_0')).toEqual('\\mu_0');
        expect(symbolTables.constants.get('\\mu_0')).toEqual('\\mu_0');
        expect(symbolTables.units.get('\\Omega')).toEqual('\\Omega');
    });

    test('functions keep the abs template', function () {
        expect(symbolTables.functions.get('abs')).toEqual('\\left|#\\right|');
    });

    test('no custom entries gives the default tables', function () {
        expect(build_symbol_tables({ customUnits: {}, customConstants: {}, customFunctions: {} })).toBe(symbolTables);
    });

    test('custom entries override the defaults', function () {
        const tables = build_symbol_tables({ customUnits: { m: '\\mathrm{metre}' }, customConstants: {}, customFunctions: {} });
        expect(tables.units.get('m')).toEqual('\\mathrm{metre}');
        expect(tables.units.get('kg')).toEqual('\\mathrm{kg}');
        expect(symbolTables.units.get('m')).toEqual('\\mathrm{m}');
    });
});
