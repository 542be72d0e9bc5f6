import { PLACEHOLDER, type Operator, type ParserContext, type SymbolTables, type TagHandler } from "./mathcad-types";
import { extract_arguments, extract_operator_arguments, read_operator, split_top_level } from "./tagged-tokenizer";

const NEWTON = '\\mathrm{N}';

// start index of a sum or product when the input gives none
const DEFAULT_START = '1';
const DEFAULT_INDEX = 'i';


/**
 * Join already-translated operands with an operator.
 * Returns null when the operator does not accept that many operands.
 */
export function render_operator(op: Operator, operands: string[]): string | null {
    switch (op) {
        case '+':
            return operands.length === 0 ? null : operands.join(' + ');
        case '-':
            if (operands.length === 0) {
                return null;
            }
            return operands.length === 1 ? `-${operands[0]}` : operands.join(' - ');
        case '*':
            return operands.length === 0 ? null : operands.join(' \\cdot ');
        case '/':
            return operands.length < 2 ? null : `\\frac{${operands[0]}}{${operands[1]}}`;
        case '^': {
            if (operands.length < 2) {
                return null;
            }
            const [base, exponent] = operands;
            return base === 'e' ? `e^{${exponent}}` : `{${base}}^{${exponent}}`;
        }
    }
}

function operator_handler(op: Operator): TagHandler {
    return (expression, ctx) => {
        const operands = extract_operator_arguments(expression).map((arg) => ctx.parse(arg));
        return render_operator(op, operands) ?? '';
    };
}

export const OPERATOR_HANDLERS = new Map<Operator, TagHandler>([
    ['+', operator_handler('+')],
    ['-', operator_handler('-')],
    ['*', operator_handler('*')],
    ['/', operator_handler('/')],
    ['^', operator_handler('^')],
]);


// (@TAG a b) -> "a <infix> b"
function binary_infix(infix: string): TagHandler {
    return (expression, ctx) => {
        const args = extract_arguments(expression);
        if (args.length < 2) {
            return '';
        }
        return `${ctx.parse(args[0])} ${infix} ${ctx.parse(args[1])}`;
    };
}

// (@TAG a b c ...) -> "a <infix> b <infix> c"
function variadic_infix(infix: string): TagHandler {
    return (expression, ctx) => {
        const args = extract_arguments(expression);
        if (args.length < 2) {
            return '';
        }
        return args.map((arg) => ctx.parse(arg)).join(` ${infix} `);
    };
}


function convert_integral(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 4) {
        return '\\int{}';
    }
    const [lower, upper, integrand, variable] = args.slice(0, 4).map((arg) => ctx.parse(arg));
    return `\\int_{${lower}}^{${upper}} ${integrand} \\, d${variable}`;
}

function convert_derivative(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 3) {
        return '';
    }
    const variable = ctx.parse(args[0]);
    const order = args[1] === PLACEHOLDER ? '1' : ctx.parse(args[1]);
    // an (@PARENS ...) function comes back as \left(...\right)
    const func = ctx.parse(args[2]);
    if (order === '1') {
        return `\\frac{\\mathrm{d}}{\\mathrm{d}${variable}} ${func}`;
    }
    return `\\frac{\\mathrm{d}^{${order}}}{\\mathrm{d}${variable}^{${order}}} ${func}`;
}

function convert_partial_derivative(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 3) {
        return '';
    }
    const variable = ctx.parse(args[0]);
    let order = '';
    if (args[1] === PLACEHOLDER) {
        // the order may trail the function: (@PART_DERIV x @PLACEHOLDER f 2)
        if (args.length > 3) {
            order = ctx.parse(args[3]);
        }
    } else {
        order = /^\d+$/.test(args[1]) ? args[1] : ctx.parse(args[1]);
    }
    const func = ctx.parse(args[2]);
    if (order === '' || order === '1') {
        return `\\frac{\\partial}{\\partial ${variable}} ${func}`;
    }
    return `\\frac{\\partial^{${order}}}{\\partial ${variable}^{${order}}} ${func}`;
}

function convert_limit(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 3) {
        return '';
    }
    const variable = ctx.parse(args[0]);
    const approach = ctx.parse(args[1]);
    let direction = '';
    let func_index = 2;
    if (args[2] === '@LEFT_HAND') {
        direction = '^{-}';
        func_index = 3;
    } else if (args[2] === '@RIGHT_HAND') {
        direction = '^{+}';
        func_index = 3;
    }
    const func = args.length > func_index ? ctx.parse(args[func_index]) : variable;
    return `\\lim_{${variable} \\to ${approach}${direction}} ${func}`;
}

function convert_prime(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    const count = args.length > 1 ? Number.parseInt(args[1], 10) : 1;
    const primes = "'".repeat(Number.isNaN(count) || count < 1 ? 1 : count);
    return `${ctx.parse(args[0])}${primes}`;
}

function convert_nthroot(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    const order = args[0] === PLACEHOLDER ? '' : ctx.parse(args[0]);
    const radicand = ctx.parse(args[1]);
    if (order === '' || order === '2') {
        return `\\sqrt{${radicand}}`;
    }
    return `\\sqrt[${order}]{${radicand}}`;
}


interface BigOperatorParts {
    index: string;
    start: string;
    upper: string;
    body: string;
}

/*
Three layouts are accepted, for sums and products alike:
    (@SUM (@IS i 0) n body)
    (@SUM i 0 n body)
    (@SUM i n body)          start defaults to 1
*/
function parse_big_operator(args: string[], ctx: ParserContext): BigOperatorParts {
    if (args[0].startsWith('(@IS')) {
        const is_args = extract_arguments(args[0]);
        const has_bounds = is_args.length >= 2;
        return {
            index: has_bounds ? ctx.parse(is_args[0]) : DEFAULT_INDEX,
            start: has_bounds ? ctx.parse(is_args[1]) : DEFAULT_START,
            upper: ctx.parse(args[1]),
            body: ctx.parse(args[2]),
        };
    }
    if (args.length >= 4) {
        const [index, start, upper, body] = args.slice(0, 4).map((arg) => ctx.parse(arg));
        return { index, start, upper, body };
    }
    return {
        index: ctx.parse(args[0]),
        start: DEFAULT_START,
        upper: ctx.parse(args[1]),
        body: ctx.parse(args[2]),
    };
}

function big_operator(command: string): TagHandler {
    return (expression, ctx) => {
        const args = extract_arguments(expression);
        if (args.length < 3) {
            return command;
        }
        const { index, start, upper, body } = parse_big_operator(args, ctx);
        return `${command}_{${index}=${start}}^{${upper}} ${body}`;
    };
}


function convert_args(expression: string, ctx: ParserContext): string {
    return extract_arguments(expression).map((arg) => ctx.parse(arg)).join(', ');
}

export function lookup_function(name: string, tables: SymbolTables): string {
    return tables.functions.get(name) ?? tables.functions.get(name.toLowerCase()) ?? name;
}

// `abs` and similar entries are templates with a `#` slot for the argument
export function apply_function(template: string, argument: string): string {
    if (template.includes('#')) {
        return template.split('#').join(argument);
    }
    return `${template}(${argument})`;
}

function convert_apply(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    // a labelled name such as (@LABEL FUNCTION f) is translated, not looked up
    const func = args[0].startsWith('(') ? ctx.parse(args[0]) : lookup_function(args[0], ctx.tables);
    if (args.length < 2) {
        return func.split('#').join('');
    }
    const argument = args[1].startsWith('(@ARGS') ? convert_args(args[1], ctx) : ctx.parse(args[1]);
    return apply_function(func, argument);
}


function convert_not(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    return `\\neg ${ctx.parse(args[0])}`;
}

function convert_negation(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    const operand = ctx.parse(args[0]);
    if (/[ +-]/.test(operand)) {
        return `-\\left(${operand}\\right)`;
    }
    return `-${operand}`;
}


/**
 * Resolve a unit name. `N` is always Newton: the case-insensitive fallback
 * would otherwise be free to land on the nano prefix `n`, so it only folds
 * case for multi-letter names.
 */
export function resolve_unit(name: string, tables: SymbolTables): string {
    if (name === 'N') {
        return NEWTON;
    }
    const exact = tables.units.get(name);
    if (exact !== undefined) {
        return exact;
    }
    if (name.length > 1) {
        const upper = name.toUpperCase();
        for (const [key, value] of tables.units) {
            if (key.length > 1 && key.toUpperCase() === upper) {
                return value;
            }
        }
    }
    return `\\mathrm{${name}}`;
}

function subscript_text(arg: string, ctx: ParserContext): string {
    if (arg.startsWith('(@SUB')) {
        const inner = extract_arguments(arg);
        return inner.length > 0 ? ctx.parse(inner[0]) : '';
    }
    return ctx.parse(arg);
}

export function resolve_constant(value: string, ctx: ParserContext): string {
    const known = ctx.tables.constants.get(value);
    if (known !== undefined) {
        return known;
    }
    if (!value.startsWith('(@ID')) {
        return value;
    }
    // (@ID e (@SUB c)) is looked up as `e_c` before falling back to e_{c}
    const id_args = extract_arguments(value);
    if (id_args.length < 2) {
        return id_args.length === 1 ? id_args[0] : value;
    }
    const name = id_args[0];
    const sub = subscript_text(id_args[1], ctx);
    return ctx.tables.constants.get(`${name}_${sub}`) ?? `${name}_{${sub}}`;
}

/**
 * Text of a labelled leaf, or null for a label kind we do not know.
 */
export function resolve_label(kind: string, value: string, ctx: ParserContext): string | null {
    switch (kind.toUpperCase()) {
        case 'CONSTANT':
            return resolve_constant(value, ctx);
        case 'UNIT':
            return resolve_unit(value, ctx.tables);
        case 'VARIABLE':
            return value;
        case 'FUNCTION':
            return `\\operatorname{${value}}`;
        default:
            return null;
    }
}

function convert_label(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    return resolve_label(args[0], args[1], ctx) ?? ctx.parse(args[1]);
}


function render_unit(expression: string, ctx: ParserContext): string {
    if (expression === 'N' || ctx.tables.units.has(expression)) {
        return resolve_unit(expression, ctx.tables);
    }
    const op = read_operator(expression);
    if (op !== null) {
        const parts = extract_operator_arguments(expression);
        switch (op) {
            case '/':
                return parts.length >= 2
                    ? `\\frac{${render_unit(parts[0], ctx)}}{${render_unit(parts[1], ctx)}}`
                    : '';
            case '^':
                return parts.length >= 2
                    ? `${render_unit(parts[0], ctx)}^{${ctx.parse(parts[1])}}`
                    : '';
            case '*':
                return parts.map((part) => render_unit(part, ctx)).join(' \\cdot ');
            default:
                return ctx.parse(expression);
        }
    }
    if (expression.startsWith('(@LABEL')) {
        const label_args = extract_arguments(expression);
        if (label_args.length >= 2 && label_args[0].toUpperCase() === 'UNIT') {
            return resolve_unit(label_args[1], ctx.tables);
        }
    }
    return ctx.parse(expression);
}

// degrees and other superscript units sit directly on the value
function attach_unit(value: string, unit: string): string {
    if (unit === '') {
        return value;
    }
    return unit.startsWith('^') ? `${value}${unit}` : `${value}\\,${unit}`;
}

function convert_scale(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    return attach_unit(ctx.parse(args[0]), render_unit(args[1], ctx));
}

// RSCALE is a result with a chosen unit; its value usually arrives in (@PARENS ...)
function convert_rscale(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    let value: string;
    if (args[0].startsWith('(@PARENS')) {
        const inner = extract_arguments(args[0]);
        value = inner.length > 0 ? ctx.parse(inner[0]) : '';
    } else {
        value = ctx.parse(args[0]);
    }
    return attach_unit(value, render_unit(args[1], ctx));
}

function convert_parens(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '()';
    }
    return `\\left(${ctx.parse(args[0])}\\right)`;
}


// larger sizes come from damaged input, not from a worksheet
const MAX_MATRIX_ENTRIES = 4096;

function convert_matrix(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    const rows = Number.parseInt(args[0] ?? '', 10);
    const cols = Number.parseInt(args[1] ?? '', 10);
    if (args.length < 3 || !(rows > 0) || !(cols > 0) || rows * cols > MAX_MATRIX_ENTRIES) {
        return '\\begin{pmatrix} \\end{pmatrix}';
    }
    const elements = args.slice(2);
    const lines: string[] = [];
    for (let i = 0; i < rows; i++) {
        const row: string[] = [];
        for (let j = 0; j < cols; j++) {
            const element = elements[i * cols + j];
            row.push(element === undefined ? '0' : ctx.parse(element));
        }
        lines.push(row.join(' & '));
    }
    return `\\begin{pmatrix}\n${lines.join(' \\\\\n')}\n\\end{pmatrix}`;
}

function convert_sym_eval(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    const left = ctx.parse(args[0]);
    const result_index = args[1].startsWith('(@KW_STACK') ? 2 : 1;
    const right = args.length > result_index ? ctx.parse(args[result_index]) : '';
    return right === '' ? left : `${left} \\rightarrow ${right}`;
}

function convert_equals(expression: string, ctx: ParserContext): string {
    const content = expression.slice(2, expression.endsWith(')') ? -1 : undefined).trim();
    const [left, ...rest] = split_top_level(content);
    if (left === undefined || rest.length === 0) {
        return expression;
    }
    // everything after the first top-level space is the right-hand side
    const right = content.slice(left.length).trim();
    return `${ctx.parse(left)} = ${ctx.parse(right)}`;
}

const FLATTENED_OPERATORS: Operator[] = ['+', '-', '*', '/'];

// a user-written equation: an arithmetic right side is rendered in place
function convert_equation(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length < 2) {
        return '';
    }
    const left = ctx.parse(args[0]);
    const op = read_operator(args[1]);
    let right: string | null = null;
    if (op !== null && FLATTENED_OPERATORS.includes(op)) {
        const operands = extract_operator_arguments(args[1]).map((arg) => ctx.parse(arg));
        right = render_operator(op, operands);
    }
    return `${left} = ${right ?? ctx.parse(args[1])}`;
}

function convert_subscript(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    return `{${ctx.parse(args[0])}}`;
}

function convert_identifier(expression: string, ctx: ParserContext): string {
    const args = extract_arguments(expression);
    if (args.length === 0) {
        return '';
    }
    const sub = args.slice(1).find((arg) => arg.startsWith('(@SUB'));
    if (sub === undefined) {
        return args[0];
    }
    return `${args[0]}_{${subscript_text(sub, ctx)}}`;
}


export const TAG_HANDLERS = new Map<string, TagHandler>([
    ['@INTEGRAL', convert_integral],
    ['@PART_DERIV', convert_partial_derivative],
    ['@LIMIT', convert_limit],
    ['@DERIV', convert_derivative],
    ['@PRIME', convert_prime],
    ['@NTHROOT', convert_nthroot],
    ['@PRODUCT', big_operator('\\prod')],
    ['@SUM', big_operator('\\sum')],
    ['@APPLY', convert_apply],
    ['@ARGS', convert_args],
    ['@ELEMENT_OF', binary_infix('\\in')],
    ['@XOR', binary_infix('\\oplus')],
    ['@GEQ', binary_infix('\\geq')],
    ['@LEQ', binary_infix('\\leq')],
    ['@GREATER_THAN', binary_infix('>')],
    ['@LESS_THAN', binary_infix('<')],
    ['@AND', variadic_infix('\\land')],
    ['@OR', variadic_infix('\\lor')],
    ['@NOT', convert_not],
    ['@NEQ', binary_infix('\\neq')],
    ['@NEG', convert_negation],
    ['@SCALE', convert_scale],
    ['@RSCALE', convert_rscale],
    ['@PARENS', convert_parens],
    ['@LABEL', convert_label],
    ['@IS', binary_infix('=')],
    ['@MATRIX', convert_matrix],
    ['@CROSS', binary_infix('\\times')],
    ['@DOT', binary_infix('\\cdot')],
    ['@SYM_EVAL', convert_sym_eval],
    ['@SUB', convert_subscript],
    ['@ID', convert_identifier],
    ['@EQ', convert_equation],
    ['=', convert_equals],
]);

