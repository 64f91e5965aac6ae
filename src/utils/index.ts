// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  formatError,
  formatLocation,
  formatErrorWithColors,
  formatAnyError,
  formatAutomatonError,
  toParseError,
} from './format';
export { highlightSnippet, getLocationFromOffset } from './highlight';
export { createLogger, type Logger, type LoggerOptions, type LogSink } from './log';
export { pointLocation, type Location, type Position } from './types';
