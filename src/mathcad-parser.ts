import type { ParserContext, SymbolTables } from "./mathcad-types";
import { OPERATOR_HANDLERS, TAG_HANDLERS } from "./convert";
import { convert_complex_evaluation, is_complex_evaluation } from "./evaluation";
import { add_spaces_after_commands } from "./spacing";
import { INFINITY, INFINITY_COMMAND, replace_symbols } from "./symbols";
import { read_operator, read_tag } from "./tagged-tokenizer";

export class RecursionLimitExceededError extends Error {
    limit: number;

    constructor(limit: number) {
        super(`Expression nested deeper than ${limit} levels`);
        this.name = 'RecursionLimitExceededError';
        this.limit = limit;
    }
}

export const DEFAULT_MAX_DEPTH = 256;

export class MathcadParser implements ParserContext {
    readonly tables: SymbolTables;
    private readonly maxDepth: number;
    private depth = 0;

    constructor(tables: SymbolTables, maxDepth: number = DEFAULT_MAX_DEPTH) {
        this.tables = tables;
        this.maxDepth = maxDepth;
    }

    parse(expression: string): string {
        if (this.depth >= this.maxDepth) {
            throw new RecursionLimitExceededError(this.maxDepth);
        }
        this.depth++;
        try {
            return this.parseExpression(expression);
        } finally {
            this.depth--;
        }
    }

    private parseExpression(raw: string): string {
        let expression = raw.trim();
        if (expression === '') {
            return '';
        }

        if (is_complex_evaluation(expression)) {
            return convert_complex_evaluation(expression, this);
        }

        const op = read_operator(expression);
        if (op !== null) {
            const handler = OPERATOR_HANDLERS.get(op);
            if (handler !== undefined) {
                return handler(expression, this);
            }
        }

        if (expression === 'e') {
            return 'e';
        }
        if (expression === INFINITY) {
            return INFINITY_COMMAND;
        }
        const symbol = this.tables.greek.get(expression) ?? this.tables.special.get(expression);
        if (symbol !== undefined) {
            return symbol;
        }

        expression = replace_symbols(expression);

        const tag = read_tag(expression);
        if (tag !== null) {
            const handler = TAG_HANDLERS.get(tag);
            if (handler !== undefined) {
                return add_spaces_after_commands(handler(expression, this));
            }
        }
        return add_spaces_after_commands(expression);
    }
}
