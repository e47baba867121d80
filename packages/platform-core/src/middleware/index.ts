export { parseQuery, parseParams } from './validation';
