/**
 * @stockpile/core: lifecycle, event and logging primitives shared by the
 * asset packages.
 */

export * from './engine/index.js';
export * from './logging/index.js';
