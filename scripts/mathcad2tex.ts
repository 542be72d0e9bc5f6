/**
 * Translate a Mathcad expression from the command line.
 *
 * Usage:
 *   npm run cli -- "(@INTEGRAL 0 1 x^2 x)"
 *   npm run cli -- --raw "(/ x y)"
 */

import { run_cli } from "../src/cli";

process.exitCode = run_cli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
});
