import { type Static, Type } from '@sinclair/typebox';

const ScalarSchema = Type.Union([Type.String(), Type.Number()]);

/**
 * A required value, or a list of acceptable values.
 */
export const PredicateValueSchema = Type.Union([
  ScalarSchema,
  Type.Array(ScalarSchema, { minItems: 1 }),
]);

/**
 * Column -> required value(s). Conjunctive across columns.
 */
export const PredicateSetSchema = Type.Record(Type.String({ minLength: 1 }), PredicateValueSchema);

export type PredicateScalar = Static<typeof ScalarSchema>;
export type PredicateValue = Static<typeof PredicateValueSchema>;
export type PredicateSet = Static<typeof PredicateSetSchema>;
