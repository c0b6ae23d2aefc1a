export * from './env'
export * as io from './io'
export * from './tensor'
export { Storage, isHostDevice } from './storage'
export { NdArray, ArrayDType, ArrayDTypeError, HOST_BYTE_ORDER, parseArrayDtype, formatArrayDtype } from './ndarray'
export type { ArrayData, NdArrayInit } from './ndarray'
export { arrayDtypeFor, tensorDtypeFor } from './interop'
export { DTYPE_NAMESPACE, dtypeToString, getNamespaceMember } from './namespace'
export type { NamespaceValue } from './namespace'
export { TaggedArray, resolveTensorDtype } from './io/bridge'
export type { DtypeTags } from './io/bridge'
export type { DType, Shape, TensorOptions } from "@tensorweave/types"
export { DeviceNameEnum } from "@tensorweave/types"
