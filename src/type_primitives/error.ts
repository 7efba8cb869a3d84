/***
 * TypeError — failures raised by the branded-id validators.
 *
 * Lives beside the primitives rather than in utils/error so that
 * Brand/validate_and_cast carry no dependency on ECS_ERROR categories.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    // Programmer error, not a runtime condition callers recover from
    super(message, false, context);
  }
}
