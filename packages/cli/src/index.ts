/**
 * @pilkit/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runShow } from "./cmd-show.js";
export { runWitgen, inputsSchema } from "./cmd-witgen.js";
export type { WitgenOptions } from "./cmd-witgen.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { resolveConfig, configSchema, ConfigError } from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
