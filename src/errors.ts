// geojson-typed/errors: aggregated validation failures

import { z } from 'zod'

/**
 * - `structural`: wrong arity, wrong element type, unclosed ring
 * - `unknown_type`: `type` tag absent or unrecognised
 * - `required_field`: a required key is missing (present-but-null is fine)
 * - `range_order`: bbox min > max on a non-longitude axis, or a disallowed id
 */
export type IssueKind = 'structural' | 'unknown_type' | 'required_field' | 'range_order'

export interface ValidationIssue {
  kind: IssueKind
  path: (string | number)[]
  message: string
}

const ISSUE_KINDS: readonly IssueKind[] = ['structural', 'unknown_type', 'required_field', 'range_order']

function isIssueKind(value: unknown): value is IssueKind {
  return ISSUE_KINDS.some((k) => k === value)
}

function formatPath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)'
}

/** Every violation found in one validation pass, thrown as a single error. */
export class GeoJSONValidationError extends Error {
  readonly issues: readonly ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(
      'Invalid GeoJSON. Error(s): ' +
        issues.map((i) => `${formatPath(i.path)}: ${i.message}`).join('; '),
    )
    this.name = 'GeoJSONValidationError'
    this.issues = issues
  }

  /** Issues of one kind, in reporting order. */
  ofKind(kind: IssueKind): ValidationIssue[] {
    return this.issues.filter((i) => i.kind === kind)
  }

  static fromZodError(error: z.ZodError): GeoJSONValidationError {
    return new GeoJSONValidationError(
      error.issues.map((issue) => ({
        kind: issueKind(issue),
        path: issue.path,
        message: issue.message,
      })),
    )
  }
}

function issueKind(issue: z.ZodIssue): IssueKind {
  switch (issue.code) {
    case z.ZodIssueCode.custom: {
      const kind: unknown = issue.params?.kind
      return isIssueKind(kind) ? kind : 'structural'
    }
    case z.ZodIssueCode.invalid_type:
      return issue.received === z.ZodParsedType.undefined ? 'required_field' : 'structural'
    case z.ZodIssueCode.invalid_literal:
      if (issue.received === undefined) return 'required_field'
      return issue.path[issue.path.length - 1] === 'type' ? 'unknown_type' : 'structural'
    case z.ZodIssueCode.invalid_union_discriminator:
      return 'unknown_type'
    default:
      return 'structural'
  }
}

/** Run a schema and convert a failure into a GeoJSONValidationError. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) throw GeoJSONValidationError.fromZodError(result.error)
  return result.data
}
