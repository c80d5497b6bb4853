export type ErrorResponse = {
  status: number;
  body: { error: string; details?: unknown };
};

/**
 * Service errors carry a stable code in `message`; maps translate those codes
 * into responses for whichever layer presents them.
 */
export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

export type ValidationDetails = {
  formErrors: string[];
  fieldErrors: Record<string, string[] | undefined>;
};

export class InvalidInputError extends Error {
  readonly details: ValidationDetails | null;

  constructor(details: ValidationDetails | null = null) {
    super('INVALID_INPUT');
    this.name = 'InvalidInputError';
    this.details = details;
  }
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, details?: unknown): ErrorResponse {
  return { status, body: { error: message, ...(details !== undefined && details !== null && { details }) } };
}

export const fulfillmentErrorMap: ErrorHandlerMap = {
  INVALID_INPUT: (error) =>
    createErrorResponse(400, 'Invalid fulfillment input.', error instanceof InvalidInputError ? error.details : undefined),
  DATE_INVALID: () => createErrorResponse(400, 'Dates must use the YYYY-MM-DD format.')
};

export const requestErrorMap: ErrorHandlerMap = {
  INVALID_INPUT: (error) =>
    createErrorResponse(400, 'Invalid blood request input.', error instanceof InvalidInputError ? error.details : undefined),
  REQUEST_STATUS_INVALID_TRANSITION: () => createErrorResponse(409, 'Invalid blood request status transition.'),
  REQUEST_NEEDED_BY_NOT_FUTURE: () => createErrorResponse(400, 'The needed by date must be in the future.'),
  REQUEST_EXPIRED: () => createErrorResponse(409, 'Blood request has expired.'),
  REQUEST_STATUS_UNCHANGED: () => createErrorResponse(409, 'Blood request already has this status.'),
  REQUEST_NOT_ACCEPTABLE: () => createErrorResponse(403, 'You cannot respond to this blood request.'),
  REQUEST_RESPONSE_DUPLICATE: () => createErrorResponse(409, 'You have already responded to this request.')
};

/**
 * Looks up a thrown value in an error map. Returns null for anything the map
 * does not know so callers can rethrow it.
 */
export function mapServiceError(error: unknown, errorMap: ErrorHandlerMap): ErrorResponse | null {
  if (!(error instanceof Error)) return null;
  const handler = errorMap[error.message];
  return handler ? handler(error) : null;
}
