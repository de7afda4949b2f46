/**
 * Document Validator — minimal structural check before a document is merged
 *
 * Only the shape the merge relies on is checked; references and schema
 * semantics are not resolved.
 */

import { z } from 'zod';

const present = z.custom<unknown>(value => value !== undefined, { message: 'Required' });

const InfoSchema = z
  .object({
    title: present,
    version: present,
  })
  .passthrough();

const DocumentShapeSchema = z
  .object({
    openapi: z.unknown(),
    swagger: z.unknown(),
    info: InfoSchema,
    paths: z.record(z.unknown()),
  })
  .passthrough()
  .refine(doc => doc.openapi !== undefined || doc.swagger !== undefined, {
    message: "Missing version marker: expected 'openapi' or 'swagger'",
    path: ['openapi'],
  });

/** Human-readable violations; empty when the document is well-formed. */
export function findDocumentIssues(value: unknown): string[] {
  const result = DocumentShapeSchema.safeParse(value);
  if (result.success) return [];
  return result.error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function isValidDocument(value: unknown): boolean {
  return DocumentShapeSchema.safeParse(value).success;
}
