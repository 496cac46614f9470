export { Router, selectTargets, type RouterOptions } from './router.js';
