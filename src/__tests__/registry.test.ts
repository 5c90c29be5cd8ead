import { describe, it, expect, beforeEach } from 'vitest';
import { resolveSketchConfig } from '../common/Config';
import { DuplicateSketchError, UnknownSketchError, ConfigurationError } from '../common/Errors';
import { DefaultSketchFactory } from '../factory/SketchFactory';
import { SketchRegistry } from '../registry/SketchRegistry';

describe('DefaultSketchFactory', () => {
  const factory = new DefaultSketchFactory(
    resolveSketchConfig({ filter: { capacity: 512, hashCount: 4 }, estimator: { bucketBits: 6 } })
  );

  it('falls back to configured defaults', () => {
    const filter = factory.createFilter();
    expect(filter.capacity).toBe(512);
    expect(filter.hashCount).toBe(4);
    expect(factory.createEstimator().bucketCount).toBe(64);
  });

  it('lets per-call options win', () => {
    expect(factory.createFilter({ hashCount: 2 }).hashCount).toBe(2);
    expect(factory.createEstimator({ bucketBits: 12 }).bucketCount).toBe(4096);
  });

  it('sizes filters from the expected load', () => {
    const filter = factory.createSizedFilter({ expectedItems: 1000, falsePositiveRate: 0.01 });
    expect(filter.capacity).toBe(9586);
  });
});

describe('SketchRegistry', () => {
  let registry: SketchRegistry;

  beforeEach(() => {
    registry = new SketchRegistry(new DefaultSketchFactory(resolveSketchConfig()));
  });

  it('hands back the filter it created', () => {
    const created = registry.createFilter('passwords');
    created.add('admin123');
    expect(registry.getFilter('passwords')).toBe(created);
    expect(registry.getFilter('passwords').check('admin123')).toBe(true);
  });

  it('creates a sized filter when given a target rate', () => {
    const filter = registry.createFilter('sized', { expectedItems: 1000, falsePositiveRate: 0.01 });
    expect(filter.hashCount).toBe(7);
  });

  it('rejects duplicate and unknown names', () => {
    registry.createFilter('f');
    expect(() => registry.createFilter('f')).toThrow(DuplicateSketchError);
    expect(() => registry.getFilter('nope')).toThrow(UnknownSketchError);
    expect(() => registry.getEstimator('nope')).toThrow('Unknown estimator: nope');
  });

  it('propagates configuration errors and registers nothing', () => {
    expect(() => registry.createFilter('bad', { capacity: 0 })).toThrow(ConfigurationError);
    expect(() => registry.getFilter('bad')).toThrow(UnknownSketchError);
  });

  it('deletes sketches', () => {
    registry.createFilter('f');
    registry.deleteFilter('f');
    expect(registry.listFilters()).toEqual([]);
    expect(() => registry.deleteFilter('f')).toThrow(UnknownSketchError);

    registry.createEstimator('e');
    registry.deleteEstimator('e');
    expect(() => registry.deleteEstimator('e')).toThrow(UnknownSketchError);
  });

  it('lists filters with their stats', () => {
    registry.createFilter('small', { capacity: 16, hashCount: 2 });
    expect(registry.listFilters()).toEqual([
      { name: 'small', capacity: 16, hashCount: 2, hashWidth: 32, byteSize: 2, setBits: 0, fillRatio: 0 },
    ]);
  });

  it('summarizes estimators with their current estimate', () => {
    registry.createEstimator('ips', { bucketBits: 4 });
    const [summary] = registry.listEstimators();
    expect(summary).toEqual({
      name: 'ips',
      bucketBits: 4,
      bucketCount: 16,
      hashWidth: 128,
      maxRank: 125,
      byteSize: 16,
      result: { estimate: 0, rawEstimate: 0.673 * 16, regime: 'linear-counting', zeroBuckets: 16 },
    });
  });
});
