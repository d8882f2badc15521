import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { QueryEngine } from '../src/engine.js';
import { sqliteBackend } from '../src/services/backends.js';
import { CatalogGenerationError, ConfigurationError, NotFoundError } from '../src/types/errors.js';
import { draft } from './helpers/fixtures.js';
import { fakeGenerator, seededEngine } from './helpers/engine.js';

describe('QueryEngine', () => {
  let engine: QueryEngine;
  let generator: ReturnType<typeof fakeGenerator>;

  beforeEach(async () => {
    ({ engine, generator } = await seededEngine());
  });

  afterEach(async () => {
    await engine.close();
  });

  it('generates the catalog from the live schema once', async () => {
    const first = await engine.listCatalog();
    const second = await engine.listCatalog();

    expect(second).toBe(first);
    expect(first.backendKind).toBe('sqlite');
    expect(first.useCases).toHaveLength(4);
    expect(generator.generate).toHaveBeenCalledTimes(1);

    const [context] = generator.generate.mock.calls[0];
    expect(context.backendKind).toBe('sqlite');
    expect(context.dialectHints).toBe(sqliteBackend.dialectHints);
    expect(context.schema).toContain('Table: employees');
    expect(context.schema).toContain('FK: projects_owner_id_fkey - owner_id → employees.id');
  });

  it('finds use cases by id or description', async () => {
    const { useCases } = await engine.listCatalog();

    expect(await engine.getUseCase(useCases[2].id)).toBe(useCases[2]);
    expect((await engine.getUseCase('Change a salary')).id).toBe(useCases[2].id);
    await expect(engine.getUseCase('Promote everyone')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('executes a use case by id', async () => {
    const { useCases } = await engine.listCatalog();
    const remove = useCases[3];

    const result = await engine.execute({ useCaseId: remove.id }, { id: 7 });

    expect(result).toEqual({
      useCase: { id: remove.id, description: 'Remove an employee', category: 'Delete' },
      statementExecuted: 'DELETE FROM employees WHERE id = :id',
      boundInputColumns: { id: 7 },
      outcome: { type: 'affected', count: 1, clearedDependents: 2 },
      message: 'Record deleted successfully after resolving 2 dependent reference(s).',
    });
  });

  it('executes a use case by description with ordered values', async () => {
    const result = await engine.execute('Employees above a salary', [90000]);

    expect(result.useCase?.category).toBe('Read');
    expect(result.boundInputColumns).toEqual({ min_salary: 90000 });
    expect(result.outcome.type).toBe('rows');
    if (result.outcome.type === 'rows') {
      expect(result.outcome.rows.map((row) => row.name)).toEqual(['Ada', 'Grace']);
    }
    expect(result.message).toBe('2 row(s) returned.');
  });

  it('runs a raw template without generating the catalog', async () => {
    const result = await engine.execute('SELECT name FROM employees WHERE id = :id', { id: 1 });

    expect(result.useCase).toBeNull();
    expect(result.outcome).toEqual({ type: 'rows', rows: [{ name: 'Ada' }] });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('rejects unknown use cases', async () => {
    await expect(engine.execute({ useCaseId: 'missing' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.execute('Fire everyone')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('regenerates the catalog after a connection change', async () => {
    await engine.listCatalog();

    const update = await engine.updateConnectionProfile({ backendKind: 'sqlite', database: ':memory:' });
    expect(update).toEqual({ message: 'Database connection updated successfully', profile: 'sqlite://:memory:' });

    await engine.listCatalog();
    expect(generator.generate).toHaveBeenCalledTimes(2);
  });

  it('regenerates the catalog when the old pool fails to close', async () => {
    await engine.listCatalog();
    const previous = await engine.connections.withSession(async ({ db }) => db);
    const destroy = vi.spyOn(previous, 'destroy').mockRejectedValueOnce(new Error('teardown failed'));

    await engine.updateConnectionProfile({ backendKind: 'sqlite', database: ':memory:' });
    await engine.listCatalog();

    expect(destroy).toHaveBeenCalledTimes(1);
    expect(generator.generate).toHaveBeenCalledTimes(2);

    destroy.mockRestore();
    await previous.destroy();
  });

  it('keeps the catalog and profile when a new profile is rejected', async () => {
    const catalog = await engine.listCatalog();

    await expect(engine.updateConnectionProfile({ backendKind: 'oracle' })).rejects.toBeInstanceOf(ConfigurationError);

    expect(engine.getConnectionProfile().backendKind).toBe('sqlite');
    expect(await engine.listCatalog()).toBe(catalog);
    expect(generator.generate).toHaveBeenCalledTimes(1);
  });

  it('regenerates after an explicit refresh', async () => {
    await engine.listCatalog();
    engine.refreshCatalog();
    await engine.listCatalog();

    expect(generator.generate).toHaveBeenCalledTimes(2);
  });

  it('drafts an ad-hoc use case without adding it to the catalog', async () => {
    const drafted = await engine.draftQuery('Remove a project');

    expect(drafted).toMatchObject({
      description: 'Remove a project',
      category: 'Delete',
      template: 'DELETE FROM projects WHERE id = :id',
      inputParameters: [{ name: 'id', type: 'INTEGER' }],
      inputColumns: ['id'],
    });
    const { useCases } = await engine.listCatalog();
    expect(useCases.map((useCase) => useCase.description)).not.toContain('Remove a project');
  });

  it('rejects a drafted statement that is not a data operation', async () => {
    generator.generateQuery.mockResolvedValueOnce(draft('DROP TABLE projects', {}, 'Drop projects'));

    await expect(engine.draftQuery('Drop projects')).rejects.toBeInstanceOf(CatalogGenerationError);
  });
});
