/**
 * Zod schemas for validating entity registry definitions
 */

import { z } from 'zod';

const codeSchema = z
  .union([z.string().min(1), z.number().int().min(0)])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^[0-9A-Za-z]+$/, 'Codes may only contain letters and digits'));

export const countyDefinitionSchema = z
  .object({
    code: codeSchema,
    name: z.string().min(1).optional(),
  })
  .strict();

export const municipalityDefinitionSchema = z
  .object({
    code: codeSchema,
    county: codeSchema,
    name: z.string().min(1).optional(),
  })
  .strict();

export const districtDefinitionSchema = z
  .object({
    code: codeSchema,
    county: codeSchema,
    municipality: codeSchema,
    name: z.string().min(1).optional(),
  })
  .strict();

export const entityDefinitionSchema = z
  .object({
    counties: z.array(countyDefinitionSchema).default([]),
    municipalities: z.array(municipalityDefinitionSchema).default([]),
    districts: z.array(districtDefinitionSchema).default([]),
  })
  .strict();

export type EntityDefinitionInput = z.input<typeof entityDefinitionSchema>;

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
