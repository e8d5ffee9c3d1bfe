export { MaterializerServiceTag, MaterializerServiceLive, binDirectory } from "./MaterializerService"
export type {
  MaterializerService,
  MaterializeError,
  MaterializeOptions,
  MaterializeReport,
} from "./MaterializerService"
