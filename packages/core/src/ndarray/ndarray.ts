/**
 * NdArray - 数组库的 n 维数组
 *
 * 只是 buffer 之上的一层视图: dtype + shape + 字节 strides + 字节偏移。
 * 从已有 buffer 构造时不拷贝数据，数组借用调用方的 buffer。
 */

import type { ArrayDTypeDescriptor, Shape, ShapeLike } from '@tensorweave/types';
import { assertValidShape, computeNumel, computeStrides, isContiguousStrides } from '@tensorweave/utils';
import { ArrayDType } from './dtype';

export type ArrayData =
    | Uint8Array
    | Int8Array
    | Uint16Array
    | Int16Array
    | Uint32Array
    | Int32Array
    | Float32Array
    | Float64Array
    | BigInt64Array
    | BigUint64Array;

export interface NdArrayInit {
    readonly buffer: ArrayBufferLike;
    readonly dtype: string | ArrayDTypeDescriptor;
    readonly shape: ShapeLike;
    /** 字节偏移 @default 0 */
    readonly byteOffset?: number;
    /** 字节 strides @default C-contiguous */
    readonly strides?: readonly number[];
}

export class NdArray {
    readonly dtype: ArrayDType;
    readonly shape: Shape;
    /** 以字节为单位 */
    readonly strides: readonly number[];
    readonly buffer: ArrayBufferLike;
    readonly byteOffset: number;

    constructor(init: NdArrayInit) {
        this.dtype = ArrayDType.from(init.dtype);
        this.shape = Object.freeze([...init.shape]);
        assertValidShape(this.shape);

        this.strides = Object.freeze(
            init.strides
                ? [...init.strides]
                : computeStrides(this.shape).map(s => s * this.dtype.itemSize)
        );
        if (this.strides.length !== this.shape.length) {
            throw new RangeError(`strides ${JSON.stringify(this.strides)} do not match shape ${JSON.stringify(this.shape)}`);
        }
        if (this.strides.some(s => !Number.isSafeInteger(s) || s < 0)) {
            throw new RangeError(`Invalid strides ${JSON.stringify(this.strides)}: must be non-negative integers`);
        }

        this.buffer = init.buffer;
        this.byteOffset = init.byteOffset ?? 0;
        if (!Number.isSafeInteger(this.byteOffset) || this.byteOffset < 0) {
            throw new RangeError(`Invalid byte offset ${this.byteOffset}`);
        }

        const extent = this.byteExtent();
        if (this.byteOffset + extent > this.buffer.byteLength) {
            throw new RangeError(
                `buffer is too small for requested array: need ${extent} bytes at offset ${this.byteOffset}, ` +
                `buffer has ${this.buffer.byteLength}`
            );
        }
    }

    /**
     * 在已有 buffer 上构造 C-contiguous 数组视图 (零拷贝)
     *
     * @param buffer - ArrayBuffer，或任意 ArrayBufferView (其自身的 byteOffset 会被计入)
     * @param offset - 相对 buffer (或 view 起点) 的字节偏移
     * @throws RangeError buffer 不够容纳 shape * itemSize 字节
     */
    static fromBuffer(
        buffer: ArrayBufferLike | ArrayBufferView,
        shape: ShapeLike,
        dtype: string | ArrayDTypeDescriptor,
        offset: number = 0
    ): NdArray {
        if (ArrayBuffer.isView(buffer)) {
            if (!Number.isSafeInteger(offset) || offset < 0) {
                throw new RangeError(`Invalid byte offset ${offset}`);
            }
            const dt = ArrayDType.from(dtype);
            const needed = computeNumel(shape) * dt.itemSize;
            if (offset + needed > buffer.byteLength) {
                throw new RangeError(
                    `buffer is too small for requested array: need ${needed} bytes at offset ${offset}, ` +
                    `view has ${buffer.byteLength}`
                );
            }
            return new NdArray({ buffer: buffer.buffer, dtype: dt, shape, byteOffset: buffer.byteOffset + offset });
        }
        return new NdArray({ buffer, dtype, shape, byteOffset: offset });
    }

    /**
     * 分配新 buffer (内容为 0)
     */
    static empty(shape: ShapeLike, dtype: string | ArrayDTypeDescriptor): NdArray {
        const dt = ArrayDType.from(dtype);
        assertValidShape(shape);
        return new NdArray({ buffer: new ArrayBuffer(computeNumel(shape) * dt.itemSize), dtype: dt, shape });
    }

    get ndim(): number {
        return this.shape.length;
    }

    /** 元素数量 */
    get size(): number {
        return computeNumel(this.shape);
    }

    get itemSize(): number {
        return this.dtype.itemSize;
    }

    get nbytes(): number {
        return this.size * this.itemSize;
    }

    isContiguous(): boolean {
        const itemSize = this.itemSize;
        return isContiguousStrides(this.shape, this.strides.map(s => s / itemSize));
    }

    /**
     * 数据的原始字节 (零拷贝)
     *
     * @throws 非 contiguous 数组
     */
    bytes(): Uint8Array {
        if (!this.isContiguous()) {
            throw new Error('bytes() requires a contiguous array');
        }
        return new Uint8Array(this.buffer, this.byteOffset, this.nbytes);
    }

    /**
     * 按 dtype 解释的 TypedArray 视图 (零拷贝)
     *
     * 'V' / 'S' 返回原始字节；'f2' 返回半精度位模式 (Uint16Array)。
     *
     * @throws 非 contiguous、非宿主字节序、或该 kind 无 TypedArray 对应
     */
    data(): ArrayData {
        if (!this.dtype.isNativeOrder) {
            throw new Error(`data() cannot read non-native byte order dtype ${this.dtype.str}`);
        }
        const bytes = this.bytes();
        const { buffer, byteOffset } = bytes;
        const length = this.size;

        switch (`${this.dtype.kind}${this.itemSize}`) {
            case 'b1':
            case 'u1':
                return new Uint8Array(buffer, byteOffset, length);
            case 'i1':
                return new Int8Array(buffer, byteOffset, length);
            case 'i2':
                return new Int16Array(buffer, byteOffset, length);
            case 'u2':
            case 'f2':
                return new Uint16Array(buffer, byteOffset, length);
            case 'i4':
                return new Int32Array(buffer, byteOffset, length);
            case 'u4':
                return new Uint32Array(buffer, byteOffset, length);
            case 'i8':
                return new BigInt64Array(buffer, byteOffset, length);
            case 'u8':
                return new BigUint64Array(buffer, byteOffset, length);
            case 'f4':
                return new Float32Array(buffer, byteOffset, length);
            case 'f8':
                return new Float64Array(buffer, byteOffset, length);
            case 'c8':
                return new Float32Array(buffer, byteOffset, length * 2);
            case 'c16':
                return new Float64Array(buffer, byteOffset, length * 2);
            default:
                if (this.dtype.kind === 'V' || this.dtype.kind === 'S') {
                    return bytes;
                }
                throw new Error(`data() has no TypedArray for dtype ${this.dtype.str}`);
        }
    }

    /**
     * 从第一个元素到最后一个元素末尾的字节跨度
     */
    private byteExtent(): number {
        if (this.shape.some(d => d === 0)) return 0;
        let last = 0;
        for (let i = 0; i < this.shape.length; i++) {
            last += (this.shape[i] - 1) * this.strides[i];
        }
        return last + this.itemSize;
    }

    toString(): string {
        return `NdArray(shape=[${this.shape.join(', ')}], dtype=${this.dtype.str})`;
    }
}
