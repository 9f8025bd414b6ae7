import { z } from 'zod';
import { defineModel } from '../../src/context/model.js';

export const employeeSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  department: z.string(),
  salary: z.number(),
  age: z.number().int(),
});

export type Employee = z.infer<typeof employeeSchema>;

export const employeeModel = defineModel({
  name: 'employees',
  table: 'employees',
  schema: employeeSchema,
});

export function makeEmployees(): Employee[] {
  return [
    { id: 1, name: 'Ada', department: 'eng', salary: 1200, age: 31 },
    { id: 2, name: 'Ben', department: 'sales', salary: 500, age: 45 },
    { id: 3, name: 'Cy', department: 'eng', salary: 700, age: 22 },
    { id: 4, name: 'Dee', department: 'admin', salary: 400, age: 38 },
    { id: 5, name: 'Eve', department: 'eng', salary: 700, age: 50 },
    { id: 6, name: 'Fay', department: 'sales', salary: 900, age: 27 },
    { id: 7, name: 'Gus', department: 'admin', salary: 650, age: 41 },
    { id: 8, name: 'Hal', department: 'eng', salary: 950, age: 33 },
    { id: 9, name: 'Ivy', department: 'sales', salary: 500, age: 29 },
    { id: 10, name: 'Jo', department: 'admin', salary: 400, age: 36 },
  ];
}

export const accountSchema = z.object({
  id: z.string(),
  owner: z.string(),
  balance: z.number(),
  lock: z.object({ version: z.number().int(), timestamp: z.date() }).optional(),
});

export type Account = z.infer<typeof accountSchema>;

export const accountModel = defineModel({
  name: 'accounts',
  table: 'ledger.accounts',
  schema: accountSchema,
  lock: true,
  columns: { owner: 'owner_name' },
});

export function ids(records: readonly { id: number | string }[]): Array<number | string> {
  return records.map((r) => r.id);
}
