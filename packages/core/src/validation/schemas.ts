/**
 * Zod schemas for entity field bags and raw feed records
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function toNumber(value: number | string, ctx: z.RefinementCtx): number {
  const number =
    typeof value === 'number' ? value : DECIMAL_PATTERN.test(value) ? Number(value) : Number.NaN;
  if (!Number.isFinite(number)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: typeof value === 'string' && Number.isNaN(number)
        ? `Not a number: "${value}"`
        : `Not a finite number: ${value}`,
    });
    return z.NEVER;
  }
  return number;
}

/**
 * NaN is the "unknown" marker for numeric entity fields: absent, null, "" and
 * NaN itself all mean unknown; decimal strings are read as numbers.
 */
const measurementSchema = z
  .union([z.number(), z.nan(), z.string()])
  .nullable()
  .optional()
  .transform((value, ctx) =>
    value === null || value === undefined || value === '' || Number.isNaN(value)
      ? Number.NaN
      : toNumber(value, ctx)
  );

/** A decimal number, given either as a number or as its string form */
const numericSchema = z.union([z.number(), z.string()]).transform(toNumber);

/** Like numericSchema, but absent or "" means unset */
const optionalNumericSchema = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value, ctx) => (value === undefined || value === '' ? null : toNumber(value, ctx)));

function requiredText(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .min(1, `${field} must not be empty`);
}

// ---------------------------------------------------------------------------
// Entity field bags
// ---------------------------------------------------------------------------

export const neoInfoSchema = z.object({
  designation: requiredText('designation'),
  name: z
    .string()
    .nullable()
    .optional()
    .transform((value) => (value ? value : null)),
  diameter: measurementSchema,
  hazardous: z.boolean().default(false),
});

export const closeApproachInfoSchema = z.object({
  designation: requiredText('designation'),
  time: z.union([z.string(), z.date()]).nullable().optional(),
  distance: measurementSchema,
  velocity: measurementSchema,
});

// ---------------------------------------------------------------------------
// Raw feed records
// ---------------------------------------------------------------------------

/**
 * One row of the NEO CSV feed, normalized into a NearEarthObject field bag:
 * empty name and diameter become unset, `pha` is true unless absent, "" or "N".
 */
export const neoRecordSchema = z
  .object({
    pdes: requiredText('pdes'),
    name: z.string().optional(),
    diameter: optionalNumericSchema,
    pha: z.string().optional(),
  })
  .transform((row) => ({
    designation: row.pdes,
    name: row.name ? row.name : null,
    diameter: row.diameter,
    hazardous: row.pha !== undefined && row.pha !== '' && row.pha !== 'N',
  }));

/** One zipped row of the close-approach JSON feed */
export const approachRecordSchema = z
  .object({
    des: requiredText('des'),
    cd: requiredText('cd'),
    dist: numericSchema,
    v_rel: numericSchema,
  })
  .transform((row) => ({
    designation: row.des,
    time: row.cd,
    distance: row.dist,
    velocity: row.v_rel,
  }));

/** Top-level shape of the close-approach JSON feed */
export const approachDocumentSchema = z.object({
  fields: z.array(z.string()),
  data: z.array(z.unknown()),
});

export type NeoInfoInput = z.input<typeof neoInfoSchema>;
export type CloseApproachInfoInput = z.input<typeof closeApproachInfoSchema>;
export type NeoRecordOutput = z.output<typeof neoRecordSchema>;
export type ApproachRecordOutput = z.output<typeof approachRecordSchema>;

// ---------------------------------------------------------------------------
// Error conversion
// ---------------------------------------------------------------------------

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
  return `${label}: ${issues}`;
}

/**
 * Parse with a schema, turning a zod failure into a ValidationError that names
 * the first offending field.
 *
 * @throws ValidationError
 */
export function parseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    const field = first && first.path.length > 0 ? first.path.join('.') : undefined;
    throw new ValidationError(formatZodIssues(label, result.error), field);
  }
  return result.data;
}
