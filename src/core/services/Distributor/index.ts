export { distribute, packBins, permuteEntries } from "./Distributor"
export type { DistributeOptions } from "./Distributor"
