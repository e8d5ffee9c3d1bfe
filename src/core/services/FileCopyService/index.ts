export {
  FileCopyServiceTag,
  FileCopyServiceLive,
  CopySourceNotFound,
  CopyPermissionDenied,
  CopyDestinationExists,
  CopyDiskFull,
  CopyFailed,
} from "./FileCopyService"
export type { FileCopyService, CopyError } from "./FileCopyService"
