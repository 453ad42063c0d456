/**
 * strfile entry point
 */

import { createStrfileProgram } from "./commands/strfile.js";
import { processContext } from "./lib/io.js";
import { runProgram } from "./lib/main.js";

const context = processContext();
process.exitCode = await runProgram(createStrfileProgram(context), process.argv.slice(2), context);
