import type { Operator, ParserContext } from "./mathcad-types";
import { OPERATOR_HANDLERS, apply_function, lookup_function, render_operator, resolve_label } from "./convert";
import { replace_symbols } from "./symbols";
import { balance_parentheses, find_matching_paren, read_operator, split_top_level } from "./tagged-tokenizer";

/*
Evaluation results copied out of a worksheet look like
    (* (@LABEL CONSTANT g) (@APPLY sin (@ARGS t)))
and are often clipped, so they are rebuilt in three steps:
    1. structural: split the top-level operands and parse each one
    2. rewrite: repair the parentheses, then rewrite innermost forms in place
    3. fall back to the plain operator handler
*/

const REF_OPEN = '\uE000';
const REF_CLOSE = '\uE001';
const REF_PATTERN = /\uE000(\d+)\uE001/g;
const IS_REF = /^\uE000\d+\uE001$/;

const LABEL_FORM = /\(@LABEL\s+([A-Za-z]+)\s+([^()\s]+)\)/g;
const APPLY_FORM = /\(@APPLY\s+([^()\s]+)\s+\(@ARGS\s+([^()]+)\)\)/g;
const OPERATOR_FORM = /\(([-+*/^])\s+([^()]+)\)/g;
const TAG_MARKER = /\(@[A-Z_]+\s*/g;

const COMPLEX_PREFIXES = ['(/', '(*', '(+', '(-'];

export function is_complex_evaluation(expression: string): boolean {
    return COMPLEX_PREFIXES.some((prefix) => expression.startsWith(prefix))
        && (expression.includes('(@LABEL') || expression.includes('(@APPLY'));
}

// Rewritten pieces are held aside so that later passes see each as one operand.
class Stash {
    private readonly pieces: string[] = [];

    put(latex: string): string {
        this.pieces.push(latex);
        return `${REF_OPEN}${this.pieces.length - 1}${REF_CLOSE}`;
    }

    restore(text: string): string {
        return text.replace(REF_PATTERN, (_match, index: string) => {
            return this.restore(this.pieces[Number(index)] ?? '');
        });
    }
}

function leaf(token: string): string {
    return IS_REF.test(token) ? token : replace_symbols(token);
}

function to_operator(char: string): Operator | null {
    return read_operator(`(${char}`);
}

function rewrite_pass(text: string, stash: Stash, ctx: ParserContext): string {
    let result = text.replace(LABEL_FORM, (_match, kind: string, value: string) => {
        return stash.put(resolve_label(kind, replace_symbols(value), ctx) ?? replace_symbols(value));
    });
    result = result.replace(APPLY_FORM, (_match, name: string, args: string) => {
        const argument = args.trim().split(/\s+/).map(leaf).join(', ');
        return stash.put(apply_function(lookup_function(name, ctx.tables), argument));
    });
    result = result.replace(OPERATOR_FORM, (match, char: string, body: string) => {
        const op = to_operator(char);
        const rendered = op === null ? null : render_operator(op, body.trim().split(/\s+/).map(leaf));
        return rendered === null ? match : stash.put(rendered);
    });
    return result;
}

function rewrite_until_stable(text: string, stash: Stash, ctx: ParserContext): string {
    let current = text;
    for (;;) {
        const next = rewrite_pass(current, stash, ctx);
        if (next === current) {
            return current;
        }
        current = next;
    }
}

/**
 * Rebuild an evaluation result by rewriting its innermost forms until nothing
 * changes. Tags the rewrite does not know are dropped with their parentheses,
 * after which the surrounding forms get another round.
 */
export function rewrite_evaluation(expression: string, ctx: ParserContext): string {
    const stash = new Stash();
    let text = rewrite_until_stable(balance_parentheses(expression), stash, ctx);
    text = balance_parentheses(text.replace(TAG_MARKER, ''));
    text = rewrite_until_stable(text, stash, ctx);
    return stash.restore(text).replace(/\s+/g, ' ').trim();
}

function convert_structurally(expression: string, op: Operator, ctx: ParserContext): string | null {
    if (find_matching_paren(expression, 0) !== expression.length - 1) {
        return null;
    }
    const args = split_top_level(expression.slice(2, -1).trim());
    if (args.length < 2) {
        return null;
    }
    return render_operator(op, args.map((arg) => ctx.parse(arg)));
}

export function convert_complex_evaluation(expression: string, ctx: ParserContext): string {
    const op = read_operator(expression);
    if (op === null) {
        return expression;
    }
    const structural = convert_structurally(expression, op, ctx);
    if (structural !== null) {
        return structural;
    }
    const rewritten = rewrite_evaluation(expression, ctx);
    if (rewritten !== expression) {
        return rewritten;
    }
    const handler = OPERATOR_HANDLERS.get(op);
    return handler === undefined ? expression : handler(expression, ctx);
}
