import { z } from 'zod';
import {
  DraftTransformer,
  HttpSubmitter,
  JsonResponseMapper,
  SubmissionPipeline,
  oneOf,
  satisfies,
  type FormSchema,
  type HttpClient,
  type TransformedFields,
} from '@submitflow/core';

export const DEPARTMENTS = ['engineering', 'finance', 'operations', 'sales', 'support'] as const;

export type Department = (typeof DEPARTMENTS)[number];

const trim = (value: unknown): string => String(value).trim();

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|[T ])/;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * `YYYY-MM-DD` of the day the user entered. ISO strings keep their own date
 * whatever time or offset follows it, other strings are read in local time,
 * and `Date` values in UTC.
 */
export function toCalendarDate(value: unknown): string {
  if (value instanceof Date) return value.toISOString().slice(0, 10);

  const text = String(value).trim();
  const iso = ISO_DATE_PREFIX.exec(text);
  if (iso?.[1]) return iso[1];

  const parsed = new Date(text);
  return `${String(parsed.getFullYear())}-${pad(parsed.getMonth() + 1)}-${pad(parsed.getDate())}`;
}

/** Fields of the employee create/edit form. */
export const employeeSchema: FormSchema = {
  fields: [
    {
      name: 'firstName',
      type: 'string',
      required: true,
      label: 'first name',
      maxLength: 64,
      wireName: 'first_name',
      transform: trim,
    },
    {
      name: 'lastName',
      type: 'string',
      required: true,
      label: 'last name',
      maxLength: 64,
      wireName: 'last_name',
      transform: trim,
    },
    {
      name: 'email',
      type: 'email',
      required: true,
      transform: (value) => trim(value).toLowerCase(),
    },
    {
      name: 'department',
      type: 'string',
      required: true,
      rules: [oneOf(DEPARTMENTS)],
    },
    {
      name: 'salary',
      type: 'number',
      required: true,
      rules: [satisfies('positive', (value) => Number(value) > 0, 'Salary must be greater than zero')],
      transform: (value) => Number(value),
    },
    {
      name: 'startDate',
      type: 'date',
      required: false,
      label: 'start date',
      wireName: 'start_date',
      transform: toCalendarDate,
    },
  ],
};

/** Body of `POST /employees` and `PUT /employees/:id`. */
export interface EmployeeRequest {
  readonly first_name: string;
  readonly last_name: string;
  readonly email: string;
  readonly department: string;
  readonly salary: number;
  readonly start_date?: string;
}

export const EmployeeSchema = z.object({
  id: z.number().int().positive(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  department: z.enum(DEPARTMENTS),
  salary: z.number(),
  start_date: z.string().nullable().optional(),
});

export type Employee = z.infer<typeof EmployeeSchema>;

export interface EmployeePipelineConfig {
  readonly client: HttpClient;
  /** When set, the pipeline updates this employee (`PUT`) instead of creating one (`POST`). */
  readonly employeeId?: number;
}

export function toEmployeeRequest(fields: TransformedFields): EmployeeRequest {
  const startDate = fields['start_date'];
  return {
    first_name: String(fields['first_name']),
    last_name: String(fields['last_name']),
    email: String(fields['email']),
    department: String(fields['department']),
    salary: Number(fields['salary']),
    ...(typeof startDate === 'string' ? { start_date: startDate } : {}),
  };
}

/** Assemble the employee create (or update) pipeline. */
export function createEmployeePipeline(config: EmployeePipelineConfig): SubmissionPipeline<EmployeeRequest, Employee> {
  const { employeeId } = config;

  return new SubmissionPipeline({
    schema: employeeSchema,
    transformer: new DraftTransformer({ schema: employeeSchema, shape: toEmployeeRequest }),
    submitter: new HttpSubmitter({
      client: config.client,
      method: employeeId === undefined ? 'POST' : 'PUT',
      path: employeeId === undefined ? '/employees' : `/employees/${String(employeeId)}`,
      responseMapper: new JsonResponseMapper(EmployeeSchema),
    }),
  });
}
