import { DataTypeMap, DType, DTypeCategory, DTypeInfo, TYPE_REGISTRY } from "@tensorweave/types";

/**
 * 读取原始 storage 的 TypedArray 构造函数
 */
export interface TypedArrayCtor<T extends DType = DType> {
    new(buffer: ArrayBufferLike, byteOffset?: number, length?: number): DataTypeMap[T];
    readonly BYTES_PER_ELEMENT: number;
}

const TYPED_ARRAY_CTORS: { [K in DType]: TypedArrayCtor<K> } = {
    bool: Uint8Array,
    int8: Int8Array,
    uint8: Uint8Array,
    int16: Int16Array,
    uint16: Uint16Array,
    int32: Int32Array,
    uint32: Uint32Array,
    int64: BigInt64Array,
    uint64: BigUint64Array,
    float16: Uint16Array,
    bfloat16: Uint16Array,
    float32: Float32Array,
    float64: Float64Array,
    float8_e4m3fn: Uint8Array,
    float8_e5m2: Uint8Array,
    complex32: Uint16Array,
    complex64: Float32Array,
    complex128: Float64Array,
    quint8: Uint8Array,
    qint8: Int8Array,
    qint32: Int32Array,
    quint4x2: Uint8Array,
    quint2x4: Uint8Array,
};

export function getTypedArrayCtor<T extends DType>(dtype: T): TypedArrayCtor<T> {
    return TYPED_ARRAY_CTORS[dtype];
}

export function isDType(value: unknown): value is DType {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(TYPE_REGISTRY, value);
}

export function getDTypeInfo(dtype: DType): DTypeInfo {
    const info = TYPE_REGISTRY[dtype];
    if (!info) throw new Error(`Unknown dtype: ${dtype}`);
    return info;
}

/**
 * 获取 dtype 的每元素字节数
 */
export function getDtypeBytes(dtype: DType): number {
    return getDTypeInfo(dtype).itemSize;
}

export const isFloatingPoint = (dt: DType): boolean => getDTypeInfo(dt).category === DTypeCategory.Floating;
/** 检查 dtype 是否是复数类型 */
export const isComplexDtype = (dt: DType): boolean => getDTypeInfo(dt).category === DTypeCategory.Complex;
