import { describe, test, expect } from 'vitest';
import { convert_complex_evaluation, is_complex_evaluation, rewrite_evaluation } from '../src/evaluation';
import { MathcadParser } from '../src/mathcad-parser';
import { symbolTables } from '../src/symbols';


describe('complex evaluation', () => {
    const parser = new MathcadParser(symbolTables);

    test('only labelled or applied operator forms qualify', function () {
        expect(is_complex_evaluation('(* (@LABEL CONSTANT g) t)')).toBe(true);
        expect(is_complex_evaluation('(- (@APPLY sin (@ARGS x)))')).toBe(true);
        expect(is_complex_evaluation('(^ (@LABEL UNIT m) 2)')).toBe(false);
        expect(is_complex_evaluation('(+ x y)')).toBe(false);
    });

    test('operands split at the top level', function () {
        expect(convert_complex_evaluation('(/ (@LABEL CONSTANT h) (* 2 π))', parser)).toEqual('\\frac{h}{2 \\cdot \\pi}');
    });

    test('clipped input is repaired and rewritten', function () {
        expect(convert_complex_evaluation('(* (@LABEL UNIT m) (@LABEL UNIT s)', parser)).toEqual('\\mathrm{m} \\cdot \\mathrm{s}');
    });

    test('extra closing parenthesis is dropped', function () {
        expect(convert_complex_evaluation('(+ (@LABEL UNIT kg)))', parser)).toEqual('\\mathrm{kg}');
    });

    test('applied function inside a clipped fraction', function () {
        expect(convert_complex_evaluation('(/ (@APPLY sin (@ARGS x)) (@LABEL UNIT s', parser))
            .toEqual('\\frac{\\sin(x)}{\\mathrm{s}}');
    });

    test('greek leaves are translated', function () {
        expect(rewrite_evaluation('(+ (@LABEL CONSTANT μ_0) α', parser)).toEqual('\\mu_0 + \\alpha');
    });

    test('unknown tags are dropped', function () {
        expect(rewrite_evaluation('(- (@LABEL UNIT m) (@FOO x)', parser)).toEqual('\\mathrm{m} - x');
    });

    test('nothing to rebuild falls back to the operator handler', function () {
        expect(convert_complex_evaluation('(+)', parser)).toEqual('');
    });
});
