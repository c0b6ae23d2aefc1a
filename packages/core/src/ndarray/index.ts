export { ArrayDType, ArrayDTypeError, HOST_BYTE_ORDER, parseArrayDtype, formatArrayDtype } from './dtype';
export { NdArray } from './ndarray';
export type { ArrayData, NdArrayInit } from './ndarray';
