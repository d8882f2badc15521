import { ConnectionManager } from '../../src/services/connection.js';
import type { UseCaseDraft } from '../../src/types/models.js';
import type { Row } from '../../src/types/utils.js';

const EMPLOYEE_SCHEMA = [
  `CREATE TABLE employees (
     id INTEGER PRIMARY KEY,
     name TEXT NOT NULL,
     salary REAL,
     manager_id INTEGER REFERENCES employees(id)
   )`,
  `CREATE TABLE projects (
     id INTEGER PRIMARY KEY,
     title TEXT NOT NULL,
     owner_id INTEGER NOT NULL REFERENCES employees(id)
   )`,
];

export const EMPLOYEES = [
  { id: 1, name: 'Ada', salary: 120000, manager_id: null },
  { id: 7, name: 'Grace', salary: 95000, manager_id: 1 },
  { id: 8, name: 'Linus', salary: 70000, manager_id: 7 },
  { id: 9, name: 'Ken', salary: 72000, manager_id: 7 },
  { id: 10, name: 'Barbara', salary: 88000, manager_id: 1 },
  { id: 11, name: 'Dennis', salary: 65000, manager_id: 10 },
];

export const PROJECTS = [{ id: 1, title: 'Compiler', owner_id: 10 }];

/**
 * In-memory SQLite connection with foreign keys on.
 */
export function sqliteConnections(connectTimeoutMs?: number): ConnectionManager {
  return new ConnectionManager({ backendKind: 'sqlite', database: ':memory:' }, { connectTimeoutMs });
}

export async function seedEmployees(connections: ConnectionManager): Promise<void> {
  await connections.withSession(async ({ db }) => {
    for (const statement of EMPLOYEE_SCHEMA) {
      await db.raw(statement);
    }
    await db('employees').insert(EMPLOYEES);
    await db('projects').insert(PROJECTS);
  });
}

export async function employee(connections: ConnectionManager, id: number): Promise<Row | undefined> {
  return connections.withSession(async ({ db }) => {
    const rows: Row[] = await db('employees').where({ id }).select('*');
    return rows[0];
  });
}

export function draft(query: string, inputs: Record<string, string> = {}, description?: string): UseCaseDraft {
  return {
    use_case: description ?? query,
    query,
    affected_columns: [],
    user_input_columns: inputs,
  };
}

/**
 * One draft per category plus extras, for catalog tests.
 */
export const EMPLOYEE_DRAFTS: UseCaseDraft[] = [
  draft('INSERT INTO employees (name, salary) VALUES (:name, :salary)', { name: 'TEXT', salary: 'REAL' }, 'Hire an employee'),
  draft('SELECT * FROM employees WHERE salary > :min_salary', { min_salary: 'REAL' }, 'Employees above a salary'),
  draft('UPDATE employees SET salary = :salary WHERE id = :id', { salary: 'REAL', id: 'INTEGER' }, 'Change a salary'),
  draft('DELETE FROM employees WHERE id = :id', { id: 'INTEGER' }, 'Remove an employee'),
];
