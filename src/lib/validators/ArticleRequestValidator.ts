import { z } from 'zod';
import { ValidationError, ValidationIssue } from '@/lib/errors/article-errors';
import { fail, ok, StageResult } from '@/lib/services/article/stage-result';

/**
 * Validación sintáctica de la petición.
 * No pretende cumplir el RFC de emails: sólo exige '@' y '.'.
 */
export const ArticleRequestSchema = z.object({
  url: z
    .string()
    .refine(
      (value) => value.startsWith('http://') || value.startsWith('https://'),
      'URL must start with http:// or https://'
    ),
  email: z
    .string()
    .refine((value) => value.includes('@') && value.includes('.'), 'Invalid email format'),
});

export type ArticleRequest = z.infer<typeof ArticleRequestSchema>;

export function validateArticleRequest(body: unknown): StageResult<ArticleRequest> {
  const parsed = ArticleRequestSchema.safeParse(body);

  if (parsed.success) {
    return ok(parsed.data);
  }

  const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code === 'custom' ? 'value_error' : issue.code,
  }));

  return fail(new ValidationError(issues));
}

export function invalidJsonBodyError(): ValidationError {
  return new ValidationError([
    { loc: ['body'], msg: 'Request body must be valid JSON', type: 'json_invalid' },
  ]);
}
