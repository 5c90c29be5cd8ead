export type { IHashFamily } from './IHashFamily';

export { Murmur3x86HashFamily, Murmur3x64HashFamily } from './MurmurHashFamily';
export { countLeadingZeros } from './bits';
