export {
  DestinationServiceTag,
  DestinationServiceLive,
  DestinationNotEmpty,
  DestinationUnwritable,
  fromDirectoryError,
} from "./DestinationService"
export type { DestinationService, DestinationError } from "./DestinationService"
