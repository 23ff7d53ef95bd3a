/**
 * Task operations exposed to the tool layer.
 */

export * from './add.js';
export * from './tree.js';
export * from './list.js';
export * from './work.js';
export * from './delete.js';
export * from './draft.js';
export * from './numbering.js';
export { parseInput, taskNodeSchema } from './schemas.js';
