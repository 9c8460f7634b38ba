export { z } from 'zod'
export { zFlexibleType } from './custom/base'
export { zBigInt, zHeight } from './custom/bigint'
export { zBytes, zBytes32, zUint8Array32 } from './custom/bytes32'
export type { FlexibleTypeInput, FlexibleTypeOptions } from './custom/types'
export { formatIssues } from './issues'
