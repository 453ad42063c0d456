/**
 * fortune entry point
 */

import { createFortuneProgram } from "./commands/fortune.js";
import { processContext } from "./lib/io.js";
import { runProgram } from "./lib/main.js";

const context = processContext();
process.exitCode = await runProgram(createFortuneProgram(context), process.argv.slice(2), context);
