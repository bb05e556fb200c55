/**
 * Request Validation Helper
 * Layer: Interfaces (HTTP)
 *
 * Checks request input against a Zod schema and returns the parsed (coerced,
 * defaulted) data, so controllers only ever see typed values:
 *
 *   const input = parseRequest(searchQuerySchema, req.query);
 *
 * Express 5 exposes req.query through a getter, so parsed data is returned
 * rather than written back onto the request.
 *
 * A failure becomes a ValidationError (400) for the global error handler.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function parseRequest<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      )
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
