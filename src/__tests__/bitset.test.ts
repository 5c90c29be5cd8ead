import { describe, it, expect } from 'vitest';
import { BitSet } from '../sketch/bitset';
import { ConfigurationError, IndexError } from '../common/Errors';

describe('BitSet', () => {
  it('packs bits into ceil(length / 8) bytes', () => {
    expect(new BitSet(1000).byteSize).toBe(125);
    expect(new BitSet(9).byteSize).toBe(2);
    expect(new BitSet(1).byteSize).toBe(1);
  });

  it('starts with every bit clear', () => {
    const bits = new BitSet(20);
    for (let i = 0; i < 20; i++) {
      expect(bits.get(i)).toBe(false);
    }
    expect(bits.count()).toBe(0);
  });

  it('sets individual bits without touching neighbours', () => {
    const bits = new BitSet(20);
    bits.set(0);
    bits.set(9);
    bits.set(19);

    expect(bits.get(0)).toBe(true);
    expect(bits.get(1)).toBe(false);
    expect(bits.get(8)).toBe(false);
    expect(bits.get(9)).toBe(true);
    expect(bits.get(10)).toBe(false);
    expect(bits.get(19)).toBe(true);
    expect(bits.count()).toBe(3);
  });

  it('treats set as idempotent', () => {
    const bits = new BitSet(16);
    bits.set(5);
    const once = new Uint8Array(bits.buffer).slice();
    bits.set(5);
    expect(new Uint8Array(bits.buffer)).toEqual(once);
    expect(bits.count()).toBe(1);
  });

  it('clears everything with clearAll', () => {
    const bits = new BitSet(16);
    bits.set(1);
    bits.set(15);
    bits.clearAll();
    expect(bits.count()).toBe(0);
    expect(bits.get(15)).toBe(false);
  });

  it('throws IndexError outside [0, length)', () => {
    const bits = new BitSet(10);
    expect(() => bits.get(-1)).toThrow(IndexError);
    expect(() => bits.get(10)).toThrow(IndexError);
    expect(() => bits.set(10)).toThrow(IndexError);
    expect(() => bits.set(1.5)).toThrow(IndexError);
    expect(() => bits.get(10)).toThrow('Index 10 out of range [0, 10)');
  });

  it('rejects a non-positive length', () => {
    expect(() => new BitSet(0)).toThrow(ConfigurationError);
    expect(() => new BitSet(-8)).toThrow(ConfigurationError);
  });

  it('rejects a buffer of the wrong size', () => {
    expect(() => new BitSet(16, new ArrayBuffer(3))).toThrow(ConfigurationError);
  });

  it('shares state through a SharedArrayBuffer', () => {
    const shared = BitSet.allocateShared(100);
    const writer = new BitSet(100, shared);
    const reader = new BitSet(100, shared);

    writer.set(42);
    writer.set(99);

    expect(reader.get(42)).toBe(true);
    expect(reader.get(99)).toBe(true);
    expect(reader.get(43)).toBe(false);
    expect(reader.count()).toBe(2);

    reader.clearAll();
    expect(writer.get(42)).toBe(false);
  });
});
