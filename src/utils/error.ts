export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  CAPACITY_EXCEEDED = "CAPACITY_EXCEEDED",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  COMPONENT_NOT_FOUND = "COMPONENT_NOT_FOUND",
  EMPTY_QUERY = "EMPTY_QUERY",
  RELATIONSHIP_NOT_REGISTERED = "RELATIONSHIP_NOT_REGISTERED",
  DUPLICATE_NAME = "DUPLICATE_NAME",
  INVALID_SNAPSHOT = "INVALID_SNAPSHOT",
  UNKNOWN_SNAPSHOT_TYPE = "UNKNOWN_SNAPSHOT_TYPE",
  INVALID_OPTIONS = "INVALID_OPTIONS",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
