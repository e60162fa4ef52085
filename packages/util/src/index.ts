export { clamp01, elapsedMs } from './math';
export { deepMerge, isPlainObject } from './deepMerge';
export type { PlainObject } from './deepMerge';
