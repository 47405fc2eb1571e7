export { ReentrancyGuard } from './reentrancy-guard.js';
