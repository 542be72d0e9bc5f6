import type { SymbolTable, SymbolTables } from "./mathcad-types";
import greekLetters from "./data/greek-letters.json";
import specialSymbols from "./data/special-symbols.json";
import units from "./data/units.json";
import constants from "./data/constants.json";
import functions from "./data/functions.json";

const INFINITY = '∞';
const INFINITY_COMMAND = '\\infty';

const greekMap: SymbolTable = new Map(Object.entries(greekLetters));
const specialMap: SymbolTable = new Map(Object.entries(specialSymbols));

/**
 * Replace every Greek letter, special symbol and the infinity glyph in `text`.
 * The parser runs this on a form before dispatching it, so handlers see
 * `\mu_0` where the input said `μ_0`.
 */
export function replace_symbols(text: string): string {
    for (const [char, latex] of greekMap) {
        text = text.replaceAll(char, latex);
    }
    for (const [char, latex] of specialMap) {
        text = text.replaceAll(char, latex);
    }
    return text.replaceAll(INFINITY, INFINITY_COMMAND);
}

// Index every entry under its symbol-replaced key too: `μ_B` and `\mu_B` both hit.
function build_lookup(...sources: { [key: string]: string }[]): SymbolTable {
    const map = new Map<string, string>();
    for (const source of sources) {
        for (const [key, value] of Object.entries(source)) {
            map.set(key, value);
        }
    }
    for (const [key, value] of Array.from(map.entries())) {
        const replaced = replace_symbols(key);
        if (replaced !== key && !map.has(replaced)) {
            map.set(replaced, value);
        }
    }
    return map;
}

export const symbolTables: SymbolTables = {
    greek: greekMap,
    special: specialMap,
    units: build_lookup(units),
    constants: build_lookup(constants),
    functions: new Map(Object.entries(functions)),
};

export interface CustomSymbols {
    customUnits: { [key: string]: string; };
    customConstants: { [key: string]: string; };
    customFunctions: { [key: string]: string; };
}

export function build_symbol_tables(custom: CustomSymbols): SymbolTables {
    const { customUnits, customConstants, customFunctions } = custom;
    const no_custom = [customUnits, customConstants, customFunctions]
        .every((table) => Object.keys(table).length === 0);
    if (no_custom) {
        return symbolTables;
    }
    return {
        greek: greekMap,
        special: specialMap,
        units: build_lookup(units, customUnits),
        constants: build_lookup(constants, customConstants),
        functions: new Map([...Object.entries(functions), ...Object.entries(customFunctions)]),
    };
}

export { INFINITY, INFINITY_COMMAND };
