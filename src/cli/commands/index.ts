export { orderCommand } from './order.js';
export { lsCommand } from './ls.js';
