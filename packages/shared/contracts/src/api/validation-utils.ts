import { z } from 'zod';

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
    public readonly rawData: unknown
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, context?: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const message = context
      ? `Response validation failed for ${context}: ${result.error.message}`
      : `Response validation failed: ${result.error.message}`;
    throw new ResponseValidationError(message, result.error.issues, data);
  }
  return result.data;
}

/** One line per issue, `path: message`, joined with '; '. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
