import { IHashFamily } from '../../hashing';

export interface IMembershipFilter {
  add(value: string): void;
  check(value: string): boolean;
}

export interface MembershipFilterConfig {
  capacity: number;
  hashCount: number;
  hashFamily?: IHashFamily;
  buffer?: ArrayBufferLike;
}

export interface FilterSizingConfig {
  expectedItems: number;
  falsePositiveRate: number;
}

export interface MembershipFilterStats {
  readonly capacity: number;
  readonly hashCount: number;
  readonly hashWidth: number;
  readonly byteSize: number;
  readonly setBits: number;
  readonly fillRatio: number;
}
