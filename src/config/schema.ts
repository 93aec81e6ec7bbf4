/**
 * Zod validation schema for relaunch.json
 */

import { z } from 'zod';

/**
 * Accepts either a list or a comma-separated string
 */
const StringListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .transform((values) => values.map((entry) => entry.trim()).filter((entry) => entry.length > 0));

const MillisecondsSchema = z
  .number()
  .int('must be a whole number of milliseconds')
  .nonnegative('cannot be negative');

export const RelaunchFileConfigSchema = z
  .object({
    script: z.string().trim().min(1, 'cannot be empty').optional(),
    args: z.array(z.string()).optional(),
    watch: StringListSchema.optional(),
    extensions: StringListSchema.optional(),
    ignore: StringListSchema.optional(),
    executable: z.string().optional(),
    delay: MillisecondsSchema.optional(),
    signal: z.string().trim().min(1).optional(),
    killTimeout: MillisecondsSchema.optional(),
    restartable: z.union([z.string().trim().min(1), z.literal(false)]).optional(),
    restartOnCrash: z.boolean().optional(),
    stdin: z.boolean().optional(),
    legacyWatch: z.boolean().optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
