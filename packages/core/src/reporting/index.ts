export {
  formatPercentage,
  formatUnknownError,
  serialiseError,
  writeLine,
} from './formatting.js';

export type { WritableTarget } from './formatting.js';
