export * from './types.js';
export * from './items.js';
export { ItemList } from './item-list.js';
export * from './log.js';
export * from './block-parser.js';
export * from './section-parser.js';
export * from './procrank-parser.js';
export * from './section-parsers.js';
export * from './traces-parser.js';
export * from './anr-parser.js';
export * from './java-crash-parser.js';
export * from './native-crash-parser.js';
export * from './logcat-parser.js';
export * from './monkey-log-parser.js';
export * from './bugreport-parser.js';
export * from './unpacker.js';
export * from './metrics.js';
