import { describe, test, expect } from 'vitest';
import { loadTestCases, TestCase } from './test-common';
import { translate, translateWithReport, MalformedInputError, RecursionLimitExceededError } from '../src';


const caseFiles = ['struct-translate.yaml'];

caseFiles.forEach((yamlFilename) => {
    const suite = loadTestCases(yamlFilename);
    describe(yamlFilename, () => {
        suite.cases.forEach((c: TestCase) => {
            test(c.title, function () {
                expect(translate(c.mathcad, c.options)).toEqual(c.latex);
            });
        });
    });
});


describe('options', () => {
    test('non-object options are rejected', function () {
        expect(() => Reflect.apply(translate, undefined, ['(+ x y)', 'strict'])).toThrow('options must be an object');
    });

    test('unclosed parenthesis is a warning by default', function () {
        const report = translateWithReport('(+ x y');
        expect(report.latex).toEqual('x + y');
        expect(report.warnings).toHaveLength(1);
        expect(report.warnings[0].message).toEqual("Unclosed '(' at position 0");
        expect(report.warnings[0].position).toEqual(0);
    });

    test('extra closing parenthesis is a warning by default', function () {
        const report = translateWithReport('(+ x y))');
        expect(report.latex).toEqual('x + y)');
        expect(report.warnings[0].message).toEqual("Unmatched ')' at position 7");
    });

    test('balanced input has no warnings', function () {
        expect(translateWithReport('(/ x y)')).toEqual({ latex: '\\frac{x}{y}', warnings: [] });
    });

    test('strict mode throws with the partial result', function () {
        let caught: unknown = null;
        try {
            translate('(+ x y', { strict: true });
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(MalformedInputError);
        if (caught instanceof MalformedInputError) {
            expect(caught.partial).toEqual('x + y');
            expect(caught.position).toEqual(0);
            expect(caught.name).toEqual('MalformedInputError');
        }
    });

    test('strict mode accepts balanced input', function () {
        expect(translate('(^ x 2)', { strict: true })).toEqual('{x}^{2}');
    });

    test('nesting deeper than maxDepth throws', function () {
        expect(() => translate('(+ (+ (+ x y) z) w)', { maxDepth: 2 })).toThrow(RecursionLimitExceededError);
    });

    test('nesting within maxDepth translates', function () {
        expect(translate('(+ (+ (+ x y) z) w)', { maxDepth: 4 })).toEqual('x + y + z + w');
    });

    test('custom tables do not leak into later calls', function () {
        translate('(@SCALE 3 lbf)', { customUnits: { lbf: '\\mathrm{lb_f}' } });
        expect(translate('(@SCALE 3 lbf)')).toEqual('3\\,lbf');
    });
});
