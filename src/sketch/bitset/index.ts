export { BitSet } from './BitSet';
