export {
  createPriceHistory,
  computeSourceHash,
  DEFAULT_PRICE_HISTORY_CONFIG,
  type AppendResult,
  type PriceHistory,
  type PriceHistoryConfig,
  type SnapshotInput,
} from './price-history'
