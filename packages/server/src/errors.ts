/**
 * Map tool failures to MCP error codes
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { isRecordKitError } from "@recordkit/engine";
import { z } from "zod";

export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    // Zod validation errors -> Invalid params
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    };
  }

  // Invalid input and type mismatches are the caller's to fix
  if (isRecordKitError(error)) {
    return {
      code: ErrorCode.InvalidParams,
      message: error.message,
    };
  }

  if (error instanceof Error) {
    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  // Unknown error type
  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}
