import { z } from 'zod';

const code = z
  .string()
  .trim()
  .min(1)
  .max(20)
  .regex(/^[A-Za-z0-9_-]+$/, 'Solo se permiten letras, números, guiones y guiones bajos')
  .transform((value) => value.toUpperCase());

const description = z
  .string()
  .trim()
  .max(500)
  .optional()
  .or(z.literal(''))
  .transform((value) => (value ? value : undefined));

export const createCategorySchema = z.object({
  code,
  name: z.string().trim().min(1).max(120),
  description,
  active: z.boolean().default(true),
  // dd/MM/yyyy, se interpreta en el comando
  validFrom: z.string().trim().min(1).optional()
});

export const updateCategorySchema = z.object({
  code: code.optional(),
  name: z.string().trim().min(1).max(120).optional(),
  description,
  active: z.boolean().optional(),
  validFrom: z.string().trim().min(1).optional()
});

const booleanQuery = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true'));

export const listCategoriesQuerySchema = z.object({
  page: z.coerce.number().int().nonnegative().default(0),
  size: z.coerce.number().int().positive().default(20),
  sortBy: z.string().optional(),
  sortDir: z.enum(['asc', 'desc']).optional(),
  name: z.string().trim().min(1).optional(),
  active: booleanQuery
});

export const categoryOptionsQuerySchema = z.object({
  name: z.string().trim().min(1).optional()
});

export type CreateCategoryInput = z.input<typeof createCategorySchema>;
export type CreateCategoryPayload = z.output<typeof createCategorySchema>;
export type UpdateCategoryInput = z.input<typeof updateCategorySchema>;
export type UpdateCategoryPayload = z.output<typeof updateCategorySchema>;
export type ListCategoriesQueryParams = z.output<typeof listCategoriesQuerySchema>;
