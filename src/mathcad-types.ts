/**
 * A symbol table maps a source token (a Unicode character or a short ASCII key
 * such as `kg` or `e_c`) to a fixed LaTeX fragment.
 */
export type SymbolTable = ReadonlyMap<string, string>;

export interface SymbolTables {
    greek: SymbolTable;
    special: SymbolTable;
    units: SymbolTable;
    constants: SymbolTable;
    functions: SymbolTable;
}

/**
 * What a handler sees of the parser: the tables of the current call and the
 * recursive entry point.
 */
export interface ParserContext {
    readonly tables: SymbolTables;
    parse(expression: string): string;
}

/**
 * Translates one tagged form, e.g. `(@NTHROOT 3 x)`, into LaTeX.
 * Handlers never throw on short argument lists; they return a degraded value.
 */
export type TagHandler = (expression: string, ctx: ParserContext) => string;

export type Operator = '+' | '-' | '*' | '/' | '^';

export const OPERATORS: readonly Operator[] = ['+', '-', '*', '/', '^'];

export const PLACEHOLDER = '@PLACEHOLDER';
