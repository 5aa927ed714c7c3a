export { getOrCreate, incrementCount } from './get-or-create.js';
