/**
 * Parsers module exports
 */
export * from './pbxproj-parser.js';
