import { z, ZodError } from 'zod';
import { AppError } from './errorHandler';

/**
 * Validation target - where to find the data to validate
 */
export type ValidationTarget = 'body' | 'params' | 'query';

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}" ` : '';
      return `${path}${issue.message}`;
    })
    .join(', ');
}

/**
 * Validates one part of a request against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param req - Request (or any object) holding the target
 * @param target - Which part of the request to validate (body, params, or query)
 * @returns The parsed value
 * @throws AppError with code VALIDATION_ERROR (400) when validation fails
 */
export function validateRequest<T extends z.ZodTypeAny>(
  schema: T,
  req: { [K in ValidationTarget]?: unknown },
  target: ValidationTarget = 'body'
): z.output<T> {
  const result = schema.safeParse(req[target] ?? {});

  if (!result.success) {
    throw new AppError(formatZodIssues(result.error), 400, 'VALIDATION_ERROR');
  }

  return result.data;
}
