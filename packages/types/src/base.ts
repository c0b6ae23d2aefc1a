/**
 * DType Mapping for strict type inference.
 * Defines how logical types map to the TypedArray used to read their raw storage in JS.
 *
 * 只有能被 JS 直接解释的类型才映射到数值 TypedArray，
 * 其余 (bfloat16, float8, 量化类型, complex32) 一律以原始位模式暴露。
 */
export interface DataTypeMap {
    bool: Uint8Array;
    int8: Int8Array;
    uint8: Uint8Array;
    int16: Int16Array;
    uint16: Uint16Array;
    int32: Int32Array;
    uint32: Uint32Array;
    int64: BigInt64Array;
    uint64: BigUint64Array;
    float16: Uint16Array;      // raw half bits (JS has no native Float16Array)
    bfloat16: Uint16Array;     // raw bf16 bits
    float32: Float32Array;
    float64: Float64Array;
    float8_e4m3fn: Uint8Array;
    float8_e5m2: Uint8Array;
    complex32: Uint16Array;    // [real, imag] half pairs, raw bits
    complex64: Float32Array;   // stored as [real, imag]
    complex128: Float64Array;  // stored as [real, imag]
    quint8: Uint8Array;
    qint8: Int8Array;
    qint32: Int32Array;
    quint4x2: Uint8Array;      // two 4-bit values per byte
    quint2x4: Uint8Array;      // four 2-bit values per byte
}

/**
 * The supported data types (e.g., 'float32', 'bfloat16')
 */
export type DType = keyof DataTypeMap;

export enum DTypeCategory {
    Bool = 0,
    Integral = 1,
    Floating = 2,
    Complex = 3,
    Quantized = 4,
}

export interface DTypeInfo {
    category: DTypeCategory;
    bitWidth: 8 | 16 | 32 | 64 | 128;
    isSigned: boolean;
    /** 每元素字节数 (量化打包类型如 quint4x2 也按 1 字节计) */
    itemSize: 1 | 2 | 4 | 8 | 16;
}

/**
 * DType 注册表
 *
 * 对标 PyTorch 2.x 的 dtype 集合。新增 dtype 时需要同步检查
 * io/bridge/classify 中的 asymmetric / unsupported 表。
 */
export const TYPE_REGISTRY: Record<DType, DTypeInfo> = {
    bool: { category: DTypeCategory.Bool, bitWidth: 8, isSigned: false, itemSize: 1 },
    uint8: { category: DTypeCategory.Integral, bitWidth: 8, isSigned: false, itemSize: 1 },
    int8: { category: DTypeCategory.Integral, bitWidth: 8, isSigned: true, itemSize: 1 },
    int16: { category: DTypeCategory.Integral, bitWidth: 16, isSigned: true, itemSize: 2 },
    uint16: { category: DTypeCategory.Integral, bitWidth: 16, isSigned: false, itemSize: 2 },
    int32: { category: DTypeCategory.Integral, bitWidth: 32, isSigned: true, itemSize: 4 },
    uint32: { category: DTypeCategory.Integral, bitWidth: 32, isSigned: false, itemSize: 4 },
    int64: { category: DTypeCategory.Integral, bitWidth: 64, isSigned: true, itemSize: 8 },
    uint64: { category: DTypeCategory.Integral, bitWidth: 64, isSigned: false, itemSize: 8 },
    float8_e4m3fn: { category: DTypeCategory.Floating, bitWidth: 8, isSigned: true, itemSize: 1 },
    float8_e5m2: { category: DTypeCategory.Floating, bitWidth: 8, isSigned: true, itemSize: 1 },
    float16: { category: DTypeCategory.Floating, bitWidth: 16, isSigned: true, itemSize: 2 },
    bfloat16: { category: DTypeCategory.Floating, bitWidth: 16, isSigned: true, itemSize: 2 },
    float32: { category: DTypeCategory.Floating, bitWidth: 32, isSigned: true, itemSize: 4 },
    float64: { category: DTypeCategory.Floating, bitWidth: 64, isSigned: true, itemSize: 8 },
    complex32: { category: DTypeCategory.Complex, bitWidth: 32, isSigned: true, itemSize: 4 },
    complex64: { category: DTypeCategory.Complex, bitWidth: 64, isSigned: true, itemSize: 8 },
    complex128: { category: DTypeCategory.Complex, bitWidth: 128, isSigned: true, itemSize: 16 },
    quint8: { category: DTypeCategory.Quantized, bitWidth: 8, isSigned: false, itemSize: 1 },
    qint8: { category: DTypeCategory.Quantized, bitWidth: 8, isSigned: true, itemSize: 1 },
    qint32: { category: DTypeCategory.Quantized, bitWidth: 32, isSigned: true, itemSize: 4 },
    quint4x2: { category: DTypeCategory.Quantized, bitWidth: 8, isSigned: false, itemSize: 1 },
    quint2x4: { category: DTypeCategory.Quantized, bitWidth: 8, isSigned: false, itemSize: 1 },
};

/**
 * Standard Shape definition
 */
export type Shape = readonly number[];

export type ShapeLike = Shape | number[];

export enum DeviceNameEnum {
    JS = "js",
    Node = "node",
    WebGPU = "webgpu",
    WASM = "wasm",
}

export enum MemoryFormat {
    Contiguous = "contiguous",
    ChannelsLast = "channels_last",
    ChannelsLast3d = "channels_last_3d",
    Preserve = "preserve",
}
