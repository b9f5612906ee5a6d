export * from './table.js';
export * from './watermark.js';
export * from './ports.js';
export * from './outcome.js';
