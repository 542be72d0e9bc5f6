import type { RefineOptions, TranslateOptions, TranslationReport } from "./exposed-types";
import { DEFAULT_MAX_DEPTH, MathcadParser, RecursionLimitExceededError } from "./mathcad-parser";
import { refine_latex } from "./latex-refiner";
import { add_spaces_after_commands } from "./spacing";
import { build_symbol_tables, symbolTables } from "./symbols";
import { MalformedInputError, check_parentheses } from "./tagged-tokenizer";


function merge_options<T extends object>(defaults: T, options: Partial<T>): T {
    if (typeof options !== 'object' || options === null) {
        throw new Error("options must be an object");
    }
    const opt = { ...defaults };
    for (const key in opt) {
        const value: T[typeof key] | undefined = options[key];
        if (value !== undefined) {
            opt[key] = value;
        }
    }
    return opt;
}

export function translateWithReport(input: string, options: Partial<TranslateOptions> = {}): TranslationReport {
    const opt = merge_options<TranslateOptions>({
        strict: false,
        maxDepth: DEFAULT_MAX_DEPTH,
        customUnits: {},
        customConstants: {},
        customFunctions: {},
    }, options);

    const parser = new MathcadParser(build_symbol_tables(opt), opt.maxDepth);
    const latex = add_spaces_after_commands(parser.parse(input));

    const problem = check_parentheses(input);
    if (problem === null) {
        return { latex, warnings: [] };
    }
    if (opt.strict) {
        throw new MalformedInputError(problem.message, problem.position, latex);
    }
    return { latex, warnings: [problem] };
}

export function translate(input: string, options: Partial<TranslateOptions> = {}): string {
    return translateWithReport(input, options).latex;
}

export function refine(latex: string, options: Partial<RefineOptions> = {}): string {
    const opt = merge_options<RefineOptions>({
        annotateUnchanged: true,
    }, options);
    return refine_latex(latex, opt);
}

export function convert(input: string, options: Partial<TranslateOptions & RefineOptions> = {}): string {
    const { annotateUnchanged, ...translateOptions } = options;
    return refine(translate(input, translateOptions), { annotateUnchanged });
}

export function normalize(latex: string): string {
    return add_spaces_after_commands(latex);
}

export { symbolTables, MalformedInputError, RecursionLimitExceededError };
