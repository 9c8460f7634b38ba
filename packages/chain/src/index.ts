export {
  createChainConfig,
  safeCreateChainConfig,
  zChainConfigSchema,
} from './config'
export { createHeaderChain } from './header-chain-manager'
export type {
  ChainConfigInput,
  FrozenChainConfig,
  HeaderChainEvent,
  HeaderChainManager,
} from './types'
