import { describe, it, expect, vi } from 'vitest';
import { assembleCatalog, CatalogCache } from '../src/services/catalog.js';
import type { Catalog } from '../src/types/models.js';
import { draft, EMPLOYEE_DRAFTS } from './helpers/fixtures.js';

describe('assembleCatalog', () => {
  it('builds one entry per valid draft', () => {
    const catalog = assembleCatalog(EMPLOYEE_DRAFTS, 'sqlite');

    expect(catalog.backendKind).toBe('sqlite');
    expect(catalog.useCases.map((useCase) => useCase.category)).toEqual(['Create', 'Read', 'Update', 'Delete']);
    expect(catalog.useCases[0]).toMatchObject({
      description: 'Hire an employee',
      template: 'INSERT INTO employees (name, salary) VALUES (:name, :salary)',
      inputParameters: [
        { name: 'name', type: 'TEXT' },
        { name: 'salary', type: 'REAL' },
      ],
      inputColumns: ['name', 'salary'],
    });
    expect(new Set(catalog.useCases.map((useCase) => useCase.id)).size).toBe(4);
  });

  it('stores the normalised template', () => {
    const catalog = assembleCatalog(
      [draft('SELECT * FROM employees WHERE salary  <min>', { min: 'REAL' }, 'Well paid')],
      'postgres',
    );

    expect(catalog.useCases[0].template).toBe('SELECT * FROM employees WHERE salary > :min');
    expect(catalog.useCases[0].inputColumns).toEqual(['salary']);
  });

  it('drops unrecognised statements and undeclared placeholders', () => {
    const catalog = assembleCatalog(
      [
        draft('DROP TABLE employees'),
        draft('SELECT * FROM employees WHERE id = :id', {}, 'Missing declaration'),
        draft('SELECT * FROM employees WHERE id = :id', { id: 'INTEGER' }, 'Find an employee'),
      ],
      'mysql',
    );

    expect(catalog.useCases.map((useCase) => useCase.description)).toEqual(['Find an employee']);
  });

  it('keeps at most the configured number per category, in order', () => {
    const reads = Array.from({ length: 7 }, (_, index) => draft(`SELECT ${index} FROM employees`, {}, `read ${index}`));
    const catalog = assembleCatalog([...reads, EMPLOYEE_DRAFTS[0]], 'sqlite');

    expect(catalog.useCases.map((useCase) => useCase.description)).toEqual([
      'read 0',
      'read 1',
      'read 2',
      'read 3',
      'read 4',
      'Hire an employee',
    ]);
    expect(assembleCatalog(reads, 'sqlite', 2).useCases).toHaveLength(2);
  });
});

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('CatalogCache', () => {
  it('shares one build between concurrent callers', async () => {
    const built = assembleCatalog(EMPLOYEE_DRAFTS, 'sqlite');
    const build = vi.fn(async () => built);
    const cache = new CatalogCache(build);

    const [first, second] = await Promise.all([cache.getOrBuild(), cache.getOrBuild()]);

    expect(first).toBe(built);
    expect(second).toBe(built);
    expect(await cache.getOrBuild()).toBe(built);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('rebuilds after invalidation', async () => {
    const build = vi.fn(async () => assembleCatalog(EMPLOYEE_DRAFTS, 'sqlite'));
    const cache = new CatalogCache(build);

    const first = await cache.getOrBuild();
    cache.invalidate();
    expect(cache.peek()).toBeNull();
    const second = await cache.getOrBuild();

    expect(second).not.toBe(first);
    expect(build).toHaveBeenCalledTimes(2);
  });

  it('does not keep a build that was invalidated while running', async () => {
    const stale = deferred<Catalog>();
    const fresh = assembleCatalog(EMPLOYEE_DRAFTS, 'postgres');
    const build = vi.fn<() => Promise<Catalog>>().mockReturnValueOnce(stale.promise).mockResolvedValueOnce(fresh);
    const cache = new CatalogCache(build);

    const pending = cache.getOrBuild();
    cache.invalidate();
    stale.resolve(assembleCatalog(EMPLOYEE_DRAFTS, 'sqlite'));

    expect((await pending).backendKind).toBe('sqlite');
    expect(cache.peek()).toBeNull();
    expect(await cache.getOrBuild()).toBe(fresh);
  });

  it('does not cache a failed build', async () => {
    const build = vi
      .fn<() => Promise<Catalog>>()
      .mockRejectedValueOnce(new Error('generator down'))
      .mockResolvedValueOnce(assembleCatalog(EMPLOYEE_DRAFTS, 'sqlite'));
    const cache = new CatalogCache(build);

    await expect(cache.getOrBuild()).rejects.toThrow('generator down');
    expect((await cache.getOrBuild()).useCases).toHaveLength(4);
  });
});
