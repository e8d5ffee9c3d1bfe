export {
  DirectoryServiceTag,
  DirectoryServiceLive,
  DirectoryNotFound,
  DirectoryPermissionDenied,
  NotADirectory,
  DirectoryUnknownError,
} from "./DirectoryService"
export type { DirectoryService, DirectoryError } from "./DirectoryService"
