export * from './assembler.js';
export * from './encoder.js';
export * from './errors.js';
export * from './label-table.js';
export * from './machine-code.js';
export * from './types.js';
