import { toErrorResponse, type ErrorResponse } from "../errors/ErrorResponse.js";
import type { Logger } from "../logging/Logger.js";
import { errorMessage } from "../utils/ids.js";

export type ApiResult<T> =
  | { readonly status: "success"; readonly data: T }
  | { readonly status: "error"; readonly error: ErrorResponse };

/**
 * Runs `operation` and folds any thrown value into an error result.
 * Errors outside the known families are logged with their message, since the
 * response only says "internal".
 */
export async function toApiResult<T>(
  operation: () => Promise<T>,
  logger: Logger
): Promise<ApiResult<T>> {
  try {
    return { status: "success", data: await operation() };
  } catch (error) {
    const response = toErrorResponse(error);
    if (response.category === "internal") {
      logger.error(`Unexpected error: ${errorMessage(error)}`);
    }
    return { status: "error", error: response };
  }
}
