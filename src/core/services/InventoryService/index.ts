export {
  InventoryServiceTag,
  InventoryServiceLive,
  SourceUnreadable,
  EmptySource,
} from "./InventoryService"
export type { InventoryService, InventoryError, InventoryOptions } from "./InventoryService"
