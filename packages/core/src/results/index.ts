export { ResultKind, NAMED_ERRORS } from './kinds.js'
export type { ResultCode, BoolResultCode, ResultKindName } from './kinds.js'

export {
  isSuccess,
  isValidObject,
  isError,
  isLurkError,
  isTrue,
  isFalse,
} from './predicates.js'

export { resultName, formatResultCode, describeResult } from './describe.js'
