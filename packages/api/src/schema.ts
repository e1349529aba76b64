import { z } from 'zod';

/** Body of POST /review. */
export const reviewBodySchema = z.object({
  subjectText: z
    .string({ required_error: 'subjectText is required' })
    .refine((text) => text.trim().length > 0, 'subjectText must not be empty'),
  context: z.string().optional(),
});

export type ReviewBody = z.infer<typeof reviewBodySchema>;

/** One line per issue, prefixed with the offending field. */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}
