import type { MalformedInputError } from "./tagged-tokenizer";
import type { SymbolTables } from "./mathcad-types";

export interface TranslateOptions {
    strict: boolean; /** default is false */
    maxDepth: number; /** default is 256 */
    customUnits: { [key: string]: string; }; /** e.g. { "kip": "\\mathrm{kip}" } */
    customConstants: { [key: string]: string; };
    customFunctions: { [key: string]: string; }; /** a `#` in the value marks where the argument goes */
}

export interface RefineOptions {
    annotateUnchanged: boolean; /** default is true */
}

export interface TranslationReport {
    latex: string;
    // the first parenthesis problem in the input; empty when balanced
    warnings: MalformedInputError[];
}

export declare function translate(input: string, options?: Partial<TranslateOptions>): string;
export declare function translateWithReport(input: string, options?: Partial<TranslateOptions>): TranslationReport;
export declare function refine(latex: string, options?: Partial<RefineOptions>): string;
export declare function convert(input: string, options?: Partial<TranslateOptions & RefineOptions>): string;
export declare function normalize(latex: string): string;

export declare const symbolTables: SymbolTables;
