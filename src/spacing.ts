import { isalnum, isalpha } from "./utils";

const GREEK_COMMANDS = [
    'pi', 'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta',
    'theta', 'iota', 'kappa', 'lambda', 'mu', 'nu', 'xi', 'omicron',
    'rho', 'sigma', 'tau', 'upsilon', 'phi', 'chi', 'psi', 'omega',
];

// Greek names glued to a following identifier, e.g. `\pib` -> `\pi b`.
// The general scan below cannot see these: it would read `pib` as one name.
const GREEK_PATTERNS: [RegExp, string][] = GREEK_COMMANDS.map((name) => [
    new RegExp(String.raw`\\${name}([a-zA-Z0-9])`, 'g'),
    `\\${name} $1`,
]);

// always followed by braces, scripts or an argument, never by a bare identifier
const COMPLETE_COMMANDS = ['int', 'sum', 'prod', 'lim', 'frac', 'sqrt', 'in'];

function space_after_commands(latex: string): string {
    let result = '';
    let pos = 0;
    while (pos < latex.length) {
        if (latex[pos] !== '\\') {
            result += latex[pos];
            pos++;
            continue;
        }
        let end = pos + 1;
        while (end < latex.length && isalpha(latex[end])) {
            end++;
        }
        const name = latex.slice(pos + 1, end);
        if (name === '') {
            // control symbol: \\ \, \{ ...
            result += latex.slice(pos, end + 1);
            pos = end + 1;
            continue;
        }
        result += latex.slice(pos, end);
        if (!COMPLETE_COMMANDS.includes(name) && end < latex.length && isalnum(latex[end])) {
            result += ' ';
        }
        pos = end;
    }
    return result;
}

/**
 * Make sure no command name runs into the identifier after it, so `\pi` + `x`
 * never becomes the undefined `\pix`.
 */
export function add_spaces_after_commands(latex: string): string {
    if (!latex.includes('\\')) {
        return latex;
    }
    let result = latex;
    for (const [pattern, replacement] of GREEK_PATTERNS) {
        result = result.replace(pattern, replacement);
    }
    return space_after_commands(result);
}
