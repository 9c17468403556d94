/**
 * Deploy invoker module
 */

export * from './runner.js';
export * from './output-parser.js';
export * from './netlify-cli.js';
