// core-lc2k パッケージの公開 API 入口。
export * from './disassembler.js';
export * from './errors.js';
export * from './executor.js';
export * from './loader.js';
export * from './machine-state.js';
export * from './report.js';
export * from './simulator.js';
export * from './types.js';
