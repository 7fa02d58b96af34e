/**
 * Command exports
 */

export { applyCommand, type ApplyCommandOptions, type ApplyCommandData } from './apply.js';
export { exampleCommand, loadExample, EXAMPLE_TYPES, type ExampleOptions, type ExampleType } from './example.js';
export { exportCommand, type ExportCommandOptions } from './export.js';
export { pingCommand } from './ping.js';
export { initCommand, initCandidates, DEFAULT_CANDIDATES, type InitOptions, type InitDeps, type AdminProbe } from './init.js';
