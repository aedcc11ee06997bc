/**
 * Failure taxonomy for the research API. Retry rules match on these classes,
 * so every HTTP outcome the client does not return is mapped to exactly one.
 */

export interface ApiErrorBody {
  code?: string;
  message?: string;
  log_id?: string;
}

export class ResearchApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly errorBody?: ApiErrorBody,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ApiRateLimitError extends ResearchApiError {}

export class ApiServerError extends ResearchApiError {}

export class InvalidRequestError extends ResearchApiError {}

/** A just-issued search id is sometimes rejected by the API; retrying usually works. */
export class InvalidSearchIdError extends InvalidRequestError {}

/** Companion of the search id defect, reported against the cursor instead. */
export class InvalidCountOrCursorError extends InvalidRequestError {}

export class InvalidUsernameError extends InvalidRequestError {}

export class RefusedUsernameError extends InvalidRequestError {}

export class ResponseDecodeError extends ResearchApiError {
  constructor(
    message: string,
    status: number,
    readonly body: string,
  ) {
    super(message, status);
  }
}

export class MalformedResponseError extends ResearchApiError {}

export class MaxApiRequestsReachedError extends ResearchApiError {
  constructor(readonly maxApiRequests: number) {
    super(`Reached maximum of ${maxApiRequests} API requests`);
  }
}

export class CredentialsError extends ResearchApiError {}

const SEARCH_ID_INVALID_PATTERN = /^Search Id \d+ is invalid or expired/;
const COUNT_OR_CURSOR_INVALID_MESSAGE = "Invalid count or cursor";
const USERNAME_INVALID_MESSAGE = "is invalid: cannot find the user";
const USERNAME_REFUSED_MESSAGE = "API cannot return this user's information";

/** Picks the most specific InvalidRequestError subclass for an HTTP 400 body. */
export function classifyInvalidRequest(status: number, body: ApiErrorBody | undefined): InvalidRequestError {
  const message = body?.message ?? "";
  if (SEARCH_ID_INVALID_PATTERN.test(message)) {
    return new InvalidSearchIdError(message, status, body);
  }
  if (message.includes(COUNT_OR_CURSOR_INVALID_MESSAGE)) {
    return new InvalidCountOrCursorError(message, status, body);
  }
  if (message.includes(USERNAME_INVALID_MESSAGE)) {
    return new InvalidUsernameError(message, status, body);
  }
  if (message.includes(USERNAME_REFUSED_MESSAGE)) {
    return new RefusedUsernameError(message, status, body);
  }
  return new InvalidRequestError(message || `Invalid request (HTTP ${status})`, status, body);
}
