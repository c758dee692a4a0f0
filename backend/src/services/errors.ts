/**
 * Domain errors thrown by the service layer. Routes translate them into the
 * `{ success: false, error: { code, message } }` envelope via `toErrorResponse`.
 */

export class ServiceError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "ServiceError";
    this.status = status;
    this.code = code;
  }
}

export class UserNotFoundError extends ServiceError {
  constructor(platformUserId: string) {
    super(404, "NOT_FOUND", `No registered user for platform id ${platformUserId}`);
    this.name = "UserNotFoundError";
  }
}

export class ProcessNotFoundError extends ServiceError {
  constructor(processId: string) {
    super(404, "NOT_FOUND", `Process ${processId} not found`);
    this.name = "ProcessNotFoundError";
  }
}

export class ProcessAlreadyExistsError extends ServiceError {
  constructor(processId: string) {
    super(409, "PROCESS_EXISTS", `Process ${processId} already exists`);
    this.name = "ProcessAlreadyExistsError";
  }
}

export class ProcessAlreadyEndedError extends ServiceError {
  constructor(processId: string) {
    super(409, "PROCESS_ALREADY_ENDED", `Process ${processId} has already ended`);
    this.name = "ProcessAlreadyEndedError";
  }
}

export function toErrorResponse(error: ServiceError) {
  return {
    success: false as const,
    error: { code: error.code, message: error.message },
  };
}
