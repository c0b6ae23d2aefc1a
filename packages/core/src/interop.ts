/**
 * Tensor dtype ↔ 数组 dtype 映射
 *
 * 只收录两边都能原生表示的类型。bfloat16 / complex32 / float8 / 量化类型
 * 在数组库中没有对应，不在表中。
 */

import { DType } from "@tensorweave/types";
import { isDType } from "@tensorweave/utils";
import { ArrayDType } from "./ndarray";

const TENSOR_TO_ARRAY: Partial<Record<DType, string>> = {
    bool: '|b1',
    uint8: '|u1',
    int8: '|i1',
    int16: '<i2',
    uint16: '<u2',
    int32: '<i4',
    uint32: '<u4',
    int64: '<i8',
    uint64: '<u8',
    float16: '<f2',
    float32: '<f4',
    float64: '<f8',
    complex64: '<c8',
    complex128: '<c16',
};

const ARRAY_TO_TENSOR: ReadonlyMap<string, DType> = new Map<string, DType>(
    Object.entries(TENSOR_TO_ARRAY).flatMap(([dtype, descr]) =>
        isDType(dtype) && descr !== undefined ? [[descr, dtype] as const] : []
    )
);

/**
 * tensor dtype 对应的数组 dtype，无对应时返回 undefined
 */
export function arrayDtypeFor(dtype: DType): ArrayDType | undefined {
    const descr = TENSOR_TO_ARRAY[dtype];
    return descr === undefined ? undefined : ArrayDType.from(descr);
}

/**
 * 数组 dtype 对应的 tensor dtype
 *
 * 非宿主字节序的数组没有对应 (tensor 只按宿主字节序解释 storage)。
 */
export function tensorDtypeFor(dtype: ArrayDType): DType | undefined {
    if (!dtype.isNativeOrder) return undefined;
    return ARRAY_TO_TENSOR.get(dtype.str);
}
