/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Turns a finished run into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputInvocation } from './reporter.js';
