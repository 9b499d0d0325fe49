// engine/src/errors.ts
import { AppError } from "./middleware/errorHandler.js";
import type { QuestionnaireField } from "./types.js";

/** Bad questionnaire or /set input; the message is shown to the user as is. */
export class ValidationError extends AppError {
  readonly field: QuestionnaireField;

  constructor(field: QuestionnaireField, message: string) {
    super(message, 400, { code: "validation_error", details: { field } });
    this.field = field;
  }
}

/** Stored profile could not be parsed. Recoverable: the caller resets the profile. */
export class CorruptProfileError extends AppError {
  readonly userId: string;

  constructor(userId: string, cause: unknown) {
    super(`Stored profile for ${userId} is corrupt`, 500, {
      code: "corrupt_profile",
      details: { userId },
      cause,
    });
    this.userId = userId;
  }
}

export function formatError(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? `: ${e.cause.message}` : "";
    return `${e.message}${cause}`.slice(0, 2000);
  }
  return String(e).slice(0, 2000);
}
