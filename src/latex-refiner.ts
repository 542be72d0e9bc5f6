import type { RefineOptions } from "./exposed-types";
import { escape_regexp } from "./utils";

export const NO_REFINEMENT_NOTE = '  % No further refinements available';

type RefinePass = (latex: string) => [string, boolean];

function replace_pass(pattern: RegExp, replacer: (match: string, ...groups: string[]) => string): RefinePass {
    return function (input: string): [string, boolean] {
        const res = input.replace(pattern, replacer);
        return [res, res !== input];
    };
}

function strip_parens(operand: string): string {
    return operand.startsWith('(') && operand.endsWith(')') ? operand.slice(1, -1) : operand;
}

// "a/b" or "(a+b)/c" -> "\frac{a}{b}"
const fractionPass = replace_pass(
    /(\w+|\([^)]+\)) *\/ *(\w+|\([^)]+\))/g,
    (_match, numerator, denominator) => `\\frac{${strip_parens(numerator)}}{${strip_parens(denominator)}}`,
);

const SPACED_OPERATORS = ['+', '-', '=', '<', '>', '\\times', '\\cdot', '\\leq', '\\geq', '\\neq'];

const operatorSpacingPasses: RefinePass[] = SPACED_OPERATORS.map((op) => {
    // `\le` must not stop a scan of `\leq`, nor `\cdot` match inside `\cdots`
    const guard = op.startsWith('\\') ? '(?![A-Za-z])' : '';
    const pattern = new RegExp(String.raw`([A-Za-z0-9}\])]) *${escape_regexp(op)}${guard} *(?=[A-Za-z0-9{(\\])`, 'g');
    return replace_pass(pattern, (_match, before) => `${before} ${op} `);
});

function operatorSpacingPass(input: string): [string, boolean] {
    let res = input;
    for (const pass of operatorSpacingPasses) {
        [res] = pass(res);
    }
    return [res, res !== input];
}

// "x^2" -> "x^{2}", "x^10" -> "x^{10}"; "x^2y" is left as it is
const exponentPass = replace_pass(
    /(\w+)\^(\d+(?![\w.])|\w(?!\w))/g,
    (_match, base, exponent) => `${base}^{${exponent}}`,
);

const sizedParensPass = replace_pass(
    /(?<!\\left)\(([^()]*\\frac\{[^{}]*\}\{[^{}]*\}[^()]*?)(?<!\\right)\)/g,
    (_match, inner) => `\\left(${inner}\\right)`,
);

const FUNCTION_NAMES = [
    'sin', 'cos', 'tan', 'cot', 'sec', 'csc',
    'arcsin', 'arccos', 'arctan', 'sinh', 'cosh', 'tanh',
    'log', 'ln', 'exp', 'lim', 'max', 'min',
];

// skips names already written as commands or set upright by hand
const functionNamePass = replace_pass(
    new RegExp(
        String.raw`(?<![\\A-Za-z])(?<!\\(?:mathrm|operatorname|text)\{)(${FUNCTION_NAMES.join('|')})(?![A-Za-z])`,
        'g',
    ),
    (_match, name) => `\\${name}`,
);

const displayStylePass = replace_pass(
    /(?<!\\displaystyle\s?)\\(int|sum|prod)(_\{[^}]*\}\^\{[^}]*\})/g,
    (_match, command, limits) => `\\displaystyle\\${command}${limits}`,
);

const VARIABLE_LETTERS = ['x', 'y', 'z', 'i', 'j', 'k', 't', 'n', 'a', 'b', 'c'];

// "5 kg" -> "5\,\mathrm{kg}"; "2x" stays a product
const unitPass = replace_pass(
    /(?<![\w.])([0-9]+(?:\.[0-9]+)?) *([a-zA-Z]+)/g,
    (match, value, unit) => VARIABLE_LETTERS.includes(unit) ? match : `${value}\\,\\mathrm{${unit}}`,
);

const ALL_PASSES: RefinePass[] = [
    fractionPass,
    operatorSpacingPass,
    exponentPass,
    sizedParensPass,
    functionNamePass,
    displayStylePass,
    unitPass,
];

export function refine_latex(latex: string, options: RefineOptions): string {
    if (latex.trim() === '') {
        return latex;
    }
    let res = latex;
    let changed = false;
    for (const pass of ALL_PASSES) {
        let pass_changed: boolean;
        [res, pass_changed] = pass(res);
        changed = changed || pass_changed;
    }
    if (!changed && options.annotateUnchanged && !res.endsWith(NO_REFINEMENT_NOTE)) {
        res += NO_REFINEMENT_NOTE;
    }
    return res;
}
