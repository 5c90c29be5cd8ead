/**
 * A family of seeded hash functions over strings.
 *
 * `hash(value, i)` must be deterministic across process restarts and return
 * an integer in [0, 2^width). Different indices act as independent seeds.
 */
export interface IHashFamily {
  readonly width: number;
  hash(value: string, index: number): bigint;
}
