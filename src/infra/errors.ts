export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR", 500);
    this.name = "ConfigurationError";
  }
}

/** A single callback pass found a second action candidate in the component tree. */
export class DuplicateActionCallbackError extends AppError {
  constructor() {
    super("Duplicate action callback", "DUPLICATE_ACTION_CALLBACK", 500);
    this.name = "DuplicateActionCallbackError";
  }
}

export class MultipleActionCallbacksError extends AppError {
  readonly callbackIds: readonly string[];

  constructor(callbackIds: readonly string[]) {
    super(
      `Not allowed to submit more than one action callback (got ${callbackIds.join(", ")})`,
      "MULTIPLE_ACTION_CALLBACKS",
      400,
    );
    this.name = "MultipleActionCallbacksError";
    this.callbackIds = callbackIds;
  }
}

export class InvalidPageIdError extends AppError {
  readonly pageId: string;

  constructor(pageId: string) {
    super(`Invalid or expired page id: ${pageId}`, "INVALID_PAGE_ID", 404);
    this.name = "InvalidPageIdError";
    this.pageId = pageId;
  }
}

/** A component started a call where calls are not allowed, such as an input callback. */
export class InvalidCallError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_CALL", 500);
    this.name = "InvalidCallError";
  }
}

export class InvalidAnswerError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_ANSWER", 500);
    this.name = "InvalidAnswerError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}
