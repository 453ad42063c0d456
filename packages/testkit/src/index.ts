export { createTempDir, removeDir, corpusText, writeCorpus } from "./fs.js";
export type { WriteCorpusOptions } from "./fs.js";
export { runCli } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { captureOutput } from "./output.js";
export type { CapturedOutput } from "./output.js";
