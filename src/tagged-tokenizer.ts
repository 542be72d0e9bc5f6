import { OPERATORS, type Operator } from "./mathcad-types";

export class MalformedInputError extends Error {
    // index into the input of the offending parenthesis
    position: number;
    // best-effort LaTeX produced despite the error, when there is one
    partial: string | null;

    constructor(message: string, position: number, partial: string | null = null) {
        super(message);
        this.name = 'MalformedInputError';
        this.position = position;
        this.partial = partial;
    }

    static readonly UNMATCHED_CLOSE = "Unmatched ')'";
    static readonly UNCLOSED_OPEN = "Unclosed '('";
}

function is_space(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/*
Split `content` into arguments at whitespace outside parentheses.
When `split_before_paren` is set, a `(` at depth 0 also starts a new argument
if something is already buffered, so `x(@SUB 1)` gives ['x', '(@SUB 1)'].
Unbalanced input is tolerated: the depth may go negative.
*/
function scan_arguments(content: string, split_before_paren: boolean): string[] {
    const args: string[] = [];
    let current = '';
    let depth = 0;

    for (const char of content) {
        if (char === '(') {
            if (split_before_paren && depth === 0 && current.trim() !== '') {
                args.push(current.trim());
                current = '';
            }
            current += char;
            depth += 1;
        } else if (char === ')') {
            current += char;
            depth -= 1;
        } else if (is_space(char) && depth === 0 && current.trim() !== '') {
            args.push(current.trim());
            current = '';
        } else {
            current += char;
        }
    }
    if (current.trim() !== '') {
        args.push(current.trim());
    }
    return args;
}

export function split_top_level(content: string): string[] {
    return scan_arguments(content, false);
}

function strip_closing(expression: string): number {
    return expression.endsWith(')') ? expression.length - 1 : expression.length;
}

/**
 * Arguments of a tagged form such as `(@INTEGRAL 0 1 f x)`.
 * The tag ends at the first space or nested `(`.
 */
export function extract_arguments(expression: string): string[] {
    let tag_end = 1;
    while (tag_end < expression.length && !is_space(expression[tag_end]) && expression[tag_end] !== '(') {
        tag_end++;
    }
    if (tag_end >= expression.length) {
        return [];
    }
    return scan_arguments(expression.slice(tag_end, strip_closing(expression)), true);
}

/**
 * Arguments of an operator form; `(* x y)` and `(*x y)` both give ['x', 'y'].
 */
export function extract_operator_arguments(expression: string): string[] {
    if (expression.length < 2) {
        return [];
    }
    return scan_arguments(expression.slice(2, strip_closing(expression)), true);
}

export function read_operator(expression: string): Operator | null {
    if (expression[0] !== '(') {
        return null;
    }
    return OPERATORS.find((op) => op === expression[1]) ?? null;
}

/**
 * `@INTEGRAL` for `(@INTEGRAL …)`, `=` for `(= …)`, otherwise null.
 */
export function read_tag(expression: string): string | null {
    if (expression.startsWith('(=')) {
        return '=';
    }
    const match = /^\((@[A-Za-z_]+)/.exec(expression);
    return match ? match[1] : null;
}

// return -1 when `start` is not a '(' or the match is missing
export function find_matching_paren(text: string, start: number): number {
    if (text[start] !== '(') {
        return -1;
    }
    let depth = 1;
    for (let i = start + 1; i < text.length; i++) {
        if (text[i] === '(') {
            depth++;
        } else if (text[i] === ')') {
            depth--;
            if (depth === 0) {
                return i;
            }
        }
    }
    return -1;
}

export function check_parentheses(text: string): MalformedInputError | null {
    const open: number[] = [];
    for (let i = 0; i < text.length; i++) {
        if (text[i] === '(') {
            open.push(i);
        } else if (text[i] === ')') {
            if (open.length === 0) {
                return new MalformedInputError(`${MalformedInputError.UNMATCHED_CLOSE} at position ${i}`, i);
            }
            open.pop();
        }
    }
    if (open.length > 0) {
        const position = open[open.length - 1];
        return new MalformedInputError(`${MalformedInputError.UNCLOSED_OPEN} at position ${position}`, position);
    }
    return null;
}

/**
 * Drop every `)` without a partner and close every `(` left open at the end.
 */
export function balance_parentheses(text: string): string {
    let result = '';
    let depth = 0;
    for (const char of text) {
        if (char === ')') {
            if (depth === 0) {
                continue;
            }
            depth--;
        } else if (char === '(') {
            depth++;
        }
        result += char;
    }
    return result + ')'.repeat(depth);
}
