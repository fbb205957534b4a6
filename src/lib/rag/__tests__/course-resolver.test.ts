import { describe, it, expect, beforeEach } from 'vitest';
import { LocalVectorClient } from '@/lib/vector/local-client';
import type { VectorCollection } from '@/lib/vector/types';
import { CourseResolver } from '../course-resolver';
import { HashingEmbedder } from './fakes';

describe('CourseResolver', () => {
  let catalog: VectorCollection;

  beforeEach(() => {
    const client = new LocalVectorClient(new HashingEmbedder());
    catalog = client.getOrCreateCollection('course_catalog');
  });

  async function addTitles(...titles: string[]): Promise<void> {
    await catalog.upsert(titles.map((title) => ({ id: title, document: title, metadata: { title } })));
  }

  it('should return null for an empty catalog', async () => {
    const resolver = new CourseResolver(() => catalog);
    expect(await resolver.resolve('Anything')).toBeNull();
  });

  it('should resolve any name to the only course when unthresholded', async () => {
    await addTitles('Machine Learning 101');
    const resolver = new CourseResolver(() => catalog);

    expect(await resolver.resolve('ML')).toBe('Machine Learning 101');
  });

  it('should pick the closest title', async () => {
    await addTitles('Machine Learning 101', 'Building Servers');
    const resolver = new CourseResolver(() => catalog);

    expect(await resolver.resolve('servers')).toBe('Building Servers');
    expect(await resolver.resolve('machine learning')).toBe('Machine Learning 101');
  });

  it('should reject hits beyond the distance threshold', async () => {
    await addTitles('Machine Learning 101');
    const resolver = new CourseResolver(() => catalog, { maxCourseDistance: 0.1 });

    expect(await resolver.resolve('ML')).toBeNull();
    expect(await resolver.resolve('Machine Learning 101')).toBe('Machine Learning 101');
  });

  it('should read the catalog on every call', async () => {
    let current = catalog;
    const resolver = new CourseResolver(() => current);
    await addTitles('Machine Learning 101');

    current = new LocalVectorClient(new HashingEmbedder()).getOrCreateCollection('course_catalog');

    expect(await resolver.resolve('Machine Learning 101')).toBeNull();
  });

  it('should return null when the engine fails', async () => {
    const broken: VectorCollection = {
      name: 'course_catalog',
      add: async () => undefined,
      upsert: async () => undefined,
      get: async () => [],
      count: async () => 0,
      query: async () => {
        throw new Error('engine down');
      },
    };
    const resolver = new CourseResolver(() => broken);

    expect(await resolver.resolve('ML')).toBeNull();
  });
});
