export * as FixedPoint from './fixed-point.js';
export { ONE_64X64, type Fixed64x64 } from './fixed-point.js';
