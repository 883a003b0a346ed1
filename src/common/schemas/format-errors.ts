import type { ValueError } from '@sinclair/typebox/errors';

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
