export { Exclusions, ALWAYS_EXCLUDED } from './exclusions.js';
