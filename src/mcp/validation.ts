import { z } from 'zod';

const Port = z
  .number({ invalid_type_error: 'Port must be a number' })
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535');

export const ListProjectsSchema = z.object({});

export const CleanupProjectsSchema = z.object({});

export const CheckPortSchema = z.object({
  port: Port,
});

export const SuggestPortSchema = z.object({
  defaultPort: Port,
  variable: z
    .string()
    .regex(/^[A-Z_]+_PORT$/, 'Variable must look like APP_PORT or FORWARD_DB_PORT')
    .optional(),
});

export type CheckPortInput = z.infer<typeof CheckPortSchema>;
export type SuggestPortInput = z.infer<typeof SuggestPortSchema>;
