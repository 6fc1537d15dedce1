export * from './stack.js';
export * from './order.js';
