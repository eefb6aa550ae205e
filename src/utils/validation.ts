import { z } from 'zod';
import { config } from '../config/config';
import { isCalendarDate } from './dates';
import { ValidationError } from './errors';
import { accountRoles, civilStatuses, sexes, visitTypes } from '../types/records';

/**
 * Input schemas for every record the store writes
 */

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'must be a valid YYYY-MM-DD date' });

const requiredName = z.string().trim().min(1, 'must not be empty').max(100, 'must be at most 100 characters');

/**
 * Optional free text: blank becomes null, undefined stays undefined so a
 * partial update leaves the field alone
 */
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max, `must be at most ${max} characters`)
    .nullable()
    .optional()
    .transform((value) => (value === undefined ? undefined : value || null));

const contactNumber = optionalText(30).refine(
  (value) => value === undefined || value === null || /^[0-9+()\-\s]+$/.test(value),
  { message: 'may only contain digits, spaces, +, - and parentheses' }
);

const vital = (max: number) =>
  z.number().positive('must be positive').max(max, `must be at most ${max}`).nullable().optional();

export const patientInputSchema = z
  .object({
    lastName: requiredName,
    firstName: requiredName,
    middleName: optionalText(100),
    dateOfBirth: calendarDateSchema.nullable().optional(),
    sex: z.enum(sexes).nullable().optional(),
    civilStatus: z.enum(civilStatuses).nullable().optional(),
    occupation: optionalText(100),
    parents: optionalText(200),
    parentContact: contactNumber,
    school: optionalText(200),
    contactNumber,
    address: optionalText(300),
    notes: optionalText(2000),
  })
  .strict();

export const patientUpdateSchema = patientInputSchema.partial();

export type PatientInput = z.input<typeof patientInputSchema>;
export type PatientUpdate = z.input<typeof patientUpdateSchema>;
export type ParsedPatientInput = z.output<typeof patientInputSchema>;
export type ParsedPatientUpdate = z.output<typeof patientUpdateSchema>;

const visitFields = z
  .object({
    patientId: z.number().int().positive(),
    visitDate: calendarDateSchema,
    visitTime: z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'must be HH:MM or HH:MM:SS')
      .nullable()
      .optional(),
    weightKg: vital(500),
    heightCm: vital(300),
    bloodPressure: z
      .string()
      .trim()
      .regex(/^\d{2,3}\/\d{2,3}$/, 'must be systolic/diastolic, e.g. 120/80')
      .nullable()
      .optional(),
    temperatureC: vital(50),
    notes: optionalText(4000),
    visitType: z.enum(visitTypes),
  })
  .strict();

export const visitInputSchema = visitFields.extend({
  visitType: z.enum(visitTypes).default('new'),
});

export const visitUpdateSchema = visitFields.omit({ patientId: true }).partial();

export type VisitInput = z.input<typeof visitInputSchema>;
export type VisitUpdate = z.input<typeof visitUpdateSchema>;

const username = z
  .string()
  .trim()
  .min(3, 'must be at least 3 characters')
  .max(50, 'must be at most 50 characters')
  .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, dot, dash and underscore');

// bcrypt only reads the first 72 bytes
const password = z.string().min(8, 'must be at least 8 characters').max(72, 'must be at most 72 characters');

export const accountInputSchema = z
  .object({
    username,
    password,
    role: z.enum(accountRoles).default('admin'),
  })
  .strict();

export const accountUpdateSchema = z
  .object({
    username: username.optional(),
    password: password.optional(),
    role: z.enum(accountRoles).optional(),
  })
  .strict();

export type AccountInput = z.input<typeof accountInputSchema>;
export type AccountUpdate = z.input<typeof accountUpdateSchema>;

export const idSchema = z.coerce.number().int().positive();

export const idParamSchema = z.object({ id: idSchema });

export const dateRangeSchema = z
  .object({
    from: calendarDateSchema.optional(),
    to: calendarDateSchema.optional(),
  })
  .strict()
  .refine((range) => !range.from || !range.to || range.from <= range.to, {
    message: 'from must not be after to',
  });

export const paginationFields = {
  page: z.coerce.number().int().min(1, 'must be at least 1').default(1),
  pageSize: z.coerce
    .number()
    .int()
    .min(1, 'must be at least 1')
    .max(config.search.maxPageSize, `must be at most ${config.search.maxPageSize}`)
    .default(config.search.defaultPageSize),
};

export const paginationSchema = z.object(paginationFields);

export const visitDateQuerySchema = z.object({ date: calendarDateSchema });

/**
 * Describe an issue without echoing the submitted value
 */
function describeIssue(issue: z.ZodIssue): string {
  switch (issue.code) {
    case 'invalid_enum_value':
      return `must be one of ${issue.options.map(String).join(', ')}`;
    case 'invalid_type':
      return issue.received === 'undefined' ? 'is required' : `must be a ${issue.expected}`;
    case 'unrecognized_keys':
      return 'is not a recognized field';
    default:
      return issue.message;
  }
}

/**
 * Parse input against a schema; the first issue becomes a ValidationError
 * naming the offending field
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field =
      issue.code === 'unrecognized_keys' ? issue.keys.join(', ') : issue.path.join('.') || 'input';
    throw new ValidationError(field, describeIssue(issue));
  }

  return result.data;
}
