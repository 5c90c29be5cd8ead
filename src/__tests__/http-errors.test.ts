import { describe, it, expect } from 'vitest';
import { errorStatus } from '../server/HTTPServer';
import {
  ConfigurationError,
  DuplicateSketchError,
  IndexError,
  UnknownSketchError,
} from '../common/Errors';
import { resolveSketchConfig } from '../common/Config';
import { DefaultSketchFactory } from '../factory/SketchFactory';
import { SketchRegistry } from '../registry/SketchRegistry';

function statusOf(action: () => unknown): number | null {
  try {
    action();
  } catch (err) {
    return errorStatus(err);
  }
  throw new Error('expected the action to throw');
}

describe('errorStatus', () => {
  it('maps sketch errors to client statuses', () => {
    expect(errorStatus(new ConfigurationError('bad'))).toBe(400);
    expect(errorStatus(new UnknownSketchError('filter', 'f'))).toBe(404);
    expect(errorStatus(new DuplicateSketchError('filter', 'f'))).toBe(409);
  });

  it('leaves everything else to the 500 handler', () => {
    expect(errorStatus(new IndexError(5, 4))).toBeNull();
    expect(errorStatus(new Error('boom'))).toBeNull();
    expect(errorStatus('not an error')).toBeNull();
  });

  it('covers the errors the registry raises', () => {
    const registry = new SketchRegistry(new DefaultSketchFactory(resolveSketchConfig()));
    registry.createFilter('f');

    expect(statusOf(() => registry.createFilter('bad', { capacity: 0 }))).toBe(400);
    expect(statusOf(() => registry.createEstimator('e', { bucketBits: 2 }))).toBe(400);
    expect(statusOf(() => registry.getFilter('missing'))).toBe(404);
    expect(statusOf(() => registry.createFilter('f'))).toBe(409);
  });
});
