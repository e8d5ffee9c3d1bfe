export {
  FileStatServiceTag,
  FileStatServiceLive,
  FileNotFound,
  FilePermissionDenied,
  FileStatUnknownError,
} from "./FileStatService"
export type { FileStatService, FileStatError, FileStat, FileKind } from "./FileStatService"
