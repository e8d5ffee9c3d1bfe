import type { PlatformError } from "@effect/platform/Error";

export type IoFailureKind =
  | "NotFound"
  | "PermissionDenied"
  | "AlreadyExists"
  | "NotADirectory"
  | "NoSpace"
  | "Other";

/**
 * Classify a platform error by its reason, falling back to the errno text
 * the Node backend puts in the message (EPERM and ENOSPC have no reason of their own).
 */
export const classifyPlatformError = (error: PlatformError): IoFailureKind => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return "NotFound";
    if (error.reason === "PermissionDenied") return "PermissionDenied";
    if (error.reason === "AlreadyExists") return "AlreadyExists";
  }

  const message = error.message.toLowerCase();

  if (message.includes("enotdir") || message.includes("not a directory")) return "NotADirectory";
  if (message.includes("eperm") || message.includes("eacces") || message.includes("permission denied")) {
    return "PermissionDenied";
  }
  if (message.includes("enoent") || message.includes("no such file")) return "NotFound";
  if (message.includes("eexist")) return "AlreadyExists";
  if (message.includes("enospc") || message.includes("no space left")) return "NoSpace";

  return "Other";
};
