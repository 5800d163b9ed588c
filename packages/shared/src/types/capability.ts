/**
 * Capability Types for Toolgate
 *
 * Declarative surface used to describe which tool methods a guest may call.
 * Specs are validated once at sandbox construction and are immutable afterwards.
 */

import { z } from 'zod';

// Predicate operators understood by the constraint evaluator
export const PredicateOperator = {
  GTE: '>=',
  LTE: '<=',
  GT: '>',
  LT: '<',
  EQ: '==',
  IN: 'in',
  STARTS_WITH: 'starts_with',
} as const;

export type PredicateOperator = (typeof PredicateOperator)[keyof typeof PredicateOperator];

export const PredicateOperatorSchema = z.enum(['>=', '<=', '>', '<', '==', 'in', 'starts_with']);

export const NUMERIC_OPERATORS: readonly PredicateOperator[] = ['>=', '<=', '>', '<'];

// Literal operands: scalars, or a list of scalars for `in`
export const ScalarSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);
export type Scalar = z.infer<typeof ScalarSchema>;

export const PredicateSchema = z
  .object({
    param: z.string().min(1).max(256),
    op: PredicateOperatorSchema,
    value: z.union([ScalarSchema, z.array(ScalarSchema)]),
  })
  .superRefine((predicate, ctx) => {
    const { op, value } = predicate;
    if (NUMERIC_OPERATORS.includes(op) && (typeof value !== 'number' || !Number.isFinite(value))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: `Operator ${op} requires a finite numeric operand`,
      });
    }
    if (op === 'in' && !Array.isArray(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'Operator in requires a list operand',
      });
    }
    if (op === 'starts_with' && typeof value !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'Operator starts_with requires a string prefix',
      });
    }
    if (op === '==' && Array.isArray(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'Operator == requires a scalar operand',
      });
    }
  });

export type PredicateSpec = z.infer<typeof PredicateSchema>;

export const CapabilitySpecSchema = z.object({
  pattern: z.string().min(1).max(1024),
  constraints: z.array(PredicateSchema).default([]),
  maxCalls: z.number().int().nonnegative().optional(),
});

export type CapabilitySpec = z.infer<typeof CapabilitySpecSchema>;
export type CapabilitySpecInput = z.input<typeof CapabilitySpecSchema>;

export const CapabilitySpecListSchema = z.array(CapabilitySpecSchema);
