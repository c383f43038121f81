import { Response } from "express";
import { SyncResult } from "../models/sync.model";

const NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  "STORAGE_NOT_FOUND",
  "CONFLICT_UNRESOLVABLE",
]);

/**
 * HTTP status for an engine operation result
 */
export const statusForResult = (result: SyncResult): number => {
  switch (result.status) {
    case "success":
      return 200;
    case "partial":
      return 207;
    case "cancelled":
      return 409;
    case "failure":
      if (result.errorCode === "OPERATION_ALREADY_IN_PROGRESS") return 409;
      if (result.requiresReauth) return 401;
      if (result.errorCode && NOT_FOUND_CODES.has(result.errorCode)) return 404;
      return 502;
  }
};

export const sendResult = (res: Response, result: SyncResult): void => {
  res.status(statusForResult(result)).json({
    success: result.status === "success" || result.status === "partial",
    data: result,
  });
};
