export { findInvalidLink, verifyLink, verifySubChain } from './sub-chain'
