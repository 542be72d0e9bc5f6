import { describe, test, expect } from 'vitest';
import { convert, refine } from '../src';
import { NO_REFINEMENT_NOTE } from '../src/latex-refiner';
import { loadTestCases, TestCase } from './test-common';


describe('refine', () => {
    test('slash becomes a fraction', function () {
        expect(refine('a/b')).toEqual('\\frac{a}{b}');
    });

    test('parenthesised numerator loses its parentheses', function () {
        expect(refine('(a+b)/c')).toEqual('\\frac{a + b}{c}');
    });

    test('operators get spaces and exponents get braces', function () {
        expect(refine('x^2+1')).toEqual('x^{2} + 1');
    });

    test('multi-digit exponents are braced whole', function () {
        expect(refine('x^10')).toEqual('x^{10}');
        expect(refine('x^{10}')).toEqual('x^{10}' + NO_REFINEMENT_NOTE);
    });

    test('an exponent followed by a letter is left alone', function () {
        expect(refine('x^2y', { annotateUnchanged: false })).toEqual('x^2y');
    });

    test('command operators get spaces', function () {
        expect(refine('a\\leq b')).toEqual('a \\leq b');
    });

    test('parentheses around a fraction are sized', function () {
        expect(refine('(\\frac{a}{b} + 1)')).toEqual('\\left(\\frac{a}{b} + 1\\right)');
    });

    test('bare function names become commands', function () {
        expect(refine('sin(x)')).toEqual('\\sin(x)');
    });

    test('upright names are left alone', function () {
        expect(refine('\\mathrm{min}')).toEqual('\\mathrm{min}' + NO_REFINEMENT_NOTE);
    });

    test('big operators get displaystyle once', function () {
        expect(refine('\\sum_{i=1}^{n} i')).toEqual('\\displaystyle\\sum_{i = 1}^{n} i');
        expect(refine('\\displaystyle\\int_{0}^{1} f', { annotateUnchanged: false })).toEqual('\\displaystyle\\int_{0}^{1} f');
    });

    test('number followed by a unit', function () {
        expect(refine('5 kg')).toEqual('5\\,\\mathrm{kg}');
        expect(refine('9.81 m')).toEqual('9.81\\,\\mathrm{m}');
    });

    test('number followed by a variable stays a product', function () {
        expect(refine('2x')).toEqual('2x' + NO_REFINEMENT_NOTE);
    });

    test('unchanged input is annotated once', function () {
        const once = refine('x');
        expect(once).toEqual('x  % No further refinements available');
        expect(refine(once)).toEqual(once);
    });

    test('annotation can be turned off', function () {
        expect(refine('x', { annotateUnchanged: false })).toEqual('x');
    });

    test('empty input', function () {
        expect(refine('')).toEqual('');
    });
});


describe('convert', () => {
    test('integral', function () {
        expect(convert('(@INTEGRAL 0 1 x^2 x)')).toEqual('\\displaystyle\\int_{0}^{1} x^{2} \\, dx');
    });

    test('integral with a two-digit power', function () {
        expect(convert('(@INTEGRAL 0 1 x^10 x)')).toEqual('\\displaystyle\\int_{0}^{1} x^{10} \\, dx');
    });

    test('sum', function () {
        expect(convert('(+ x y)')).toEqual('x + y  % No further refinements available');
        expect(convert('(+ x y)', { annotateUnchanged: false })).toEqual('x + y');
    });

    test('product with bounds', function () {
        expect(convert('(@PRODUCT (@IS i 1) n i)')).toEqual('\\displaystyle\\prod_{i = 1}^{n} i');
    });

    test('value with a unit', function () {
        expect(convert('(@SCALE 5 m)')).toEqual('5\\,\\mathrm{m}' + NO_REFINEMENT_NOTE);
    });
});


function without_note(latex: string): string {
    return latex.endsWith(NO_REFINEMENT_NOTE) ? latex.slice(0, -NO_REFINEMENT_NOTE.length) : latex;
}

describe('refining twice', () => {
    const suite = loadTestCases('examples.yaml');
    suite.cases.forEach((c: TestCase) => {
        test(c.title, function () {
            const once = convert(c.mathcad, c.options);
            expect(without_note(refine(once))).toEqual(without_note(once));
        });
    });
});
