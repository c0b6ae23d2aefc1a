import { DataTypeMap, DeviceNameEnum, DType, IStorage, Shape, ShapeLike, TensorInit, TensorOptions } from "@tensorweave/types";
import {
    assertValidShape,
    computeNumel,
    computeStrides,
    getDTypeInfo,
    getTypedArrayCtor,
    isComplexDtype,
    isContiguousStrides,
    isFloatingPoint,
    nextTensorId,
} from "@tensorweave/utils";
import { env } from './env';
import { arrayDtypeFor, tensorDtypeFor } from './interop';
import { NdArray } from './ndarray';
import { isHostDevice, Storage } from './storage';

/**
 * Tensor 与数组之间没有 dtype 映射时抛出
 *
 * 与其它错误区分开: 调用方可以据此改走不依赖 dtype 映射的路径。
 */
export class TensorConversionError extends TypeError {
    constructor(message: string) {
        super(message);
        this.name = 'TensorConversionError';
    }
}

function canRequireGrad(dtype: DType): boolean {
    return isFloatingPoint(dtype) || isComplexDtype(dtype);
}

/**
 * strided 张量覆盖的元素跨度 (从 offset 起，到最后一个元素之后)
 */
function elementExtent(shape: Shape, strides: readonly number[]): number {
    if (shape.some(d => d === 0)) return 0;
    let last = 0;
    for (let i = 0; i < shape.length; i++) {
        last += (shape[i] - 1) * strides[i];
    }
    return last + 1;
}

export class Tensor<T extends DType = DType> {

    readonly id: number = nextTensorId();

    readonly dtype: T;

    readonly shape: Shape;

    /** 以元素为单位 */
    readonly strides: readonly number[];

    /** storage 内的元素偏移 */
    readonly offset: number;

    readonly storage: IStorage;

    private _requiresGrad = false;

    constructor(init: TensorInit<T>) {
        this.dtype = init.dtype;
        this.shape = Object.freeze([...init.shape]);
        assertValidShape(this.shape);

        this.strides = Object.freeze(init.strides ? [...init.strides] : computeStrides(this.shape));
        if (this.strides.length !== this.shape.length) {
            throw new Error(`strides ${JSON.stringify(this.strides)} do not match shape ${JSON.stringify(this.shape)}`);
        }
        if (this.strides.some(s => !Number.isSafeInteger(s) || s < 0)) {
            throw new Error(`Invalid strides ${JSON.stringify(this.strides)}: must be non-negative integers`);
        }

        this.offset = init.offset ?? 0;
        if (!Number.isSafeInteger(this.offset) || this.offset < 0) {
            throw new Error(`Invalid storage offset ${this.offset}`);
        }

        this.storage = init.storage;
        const extent = elementExtent(this.shape, this.strides);
        const needed = extent === 0 ? 0 : (this.offset + extent) * this.elementSize();
        if (needed > this.storage.byteLength) {
            throw new RangeError(
                `Tensor of shape [${this.shape}] (${this.dtype}) needs ${needed} bytes, storage has ${this.storage.byteLength}`
            );
        }

        if (init.requiresGrad) {
            this.requiresGrad_(true);
        }
    }

    /**
     * @description
     * Allocate a zero-filled tensor.
     *
     * ```ts
     * Tensor.empty([2, 3], 'bfloat16'); // 12 bytes of storage
     * ```
     */
    static empty<T extends DType>(shape: ShapeLike, dtype: T, options: Omit<TensorOptions, 'dtype'> = {}): Tensor<T> {
        assertValidShape(shape);
        const device = options.device ?? env.getDefaultDevice();
        const storage = Storage.allocate(computeNumel(shape) * getDTypeInfo(dtype).itemSize, device);
        return new Tensor({ dtype, shape, storage, requiresGrad: options.requiresGrad });
    }

    /**
     * @description
     * Create a contiguous tensor holding a copy of raw bytes.
     * The byte length must equal numel * elementSize.
     */
    static fromBytes<T extends DType>(
        bytes: ArrayBufferLike | ArrayBufferView,
        shape: ShapeLike,
        dtype: T,
        options: Omit<TensorOptions, 'dtype'> = {}
    ): Tensor<T> {
        const src = ArrayBuffer.isView(bytes)
            ? new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength)
            : new Uint8Array(bytes);
        const tensor = Tensor.empty(shape, dtype, options);
        if (src.byteLength !== tensor.nbytes) {
            throw new RangeError(
                `fromBytes: got ${src.byteLength} bytes, shape [${tensor.shape}] of ${dtype} needs ${tensor.nbytes}`
            );
        }
        new Uint8Array(tensor.storage.buffer, tensor.storage.bufferOffset, tensor.nbytes).set(src);
        return tensor;
    }

    /**
     * @description
     * Wrap an array as a tensor sharing its memory (zero-copy).
     *
     * @throws TensorConversionError the array dtype has no tensor equivalent
     */
    static fromNumpy(array: NdArray): Tensor {
        const dtype = tensorDtypeFor(array.dtype);
        if (dtype === undefined) {
            throw new TensorConversionError(
                `can't convert array of type ${array.dtype.name} (${array.dtype.str}) to a tensor`
            );
        }

        const itemSize = array.itemSize;
        if (array.strides.some(s => s % itemSize !== 0)) {
            throw new Error(
                `array strides ${JSON.stringify(array.strides)} are not a multiple of the element size ${itemSize}`
            );
        }
        const strides = array.strides.map(s => s / itemSize);
        const storage = Storage.wrap(
            array.buffer,
            array.byteOffset,
            elementExtent(array.shape, strides) * itemSize,
            DeviceNameEnum.JS
        );
        return new Tensor({ dtype, shape: array.shape, strides, storage });
    }

    get device(): DeviceNameEnum {
        return this.storage.device;
    }

    get ndim(): number {
        return this.shape.length;
    }

    get numel(): number {
        return computeNumel(this.shape);
    }

    get nbytes(): number {
        return this.numel * this.elementSize();
    }

    get requiresGrad(): boolean {
        return this._requiresGrad;
    }

    /**
     * 原地设置 requiresGrad，只有浮点与复数张量可以要求梯度
     */
    requiresGrad_(requiresGrad: boolean = true): this {
        if (requiresGrad && !canRequireGrad(this.dtype)) {
            throw new Error(`Only Tensors of floating point and complex dtype can require gradients, got ${this.dtype}`);
        }
        this._requiresGrad = requiresGrad;
        return this;
    }

    elementSize(): number {
        return getDTypeInfo(this.dtype).itemSize;
    }

    isContiguous(): boolean {
        return isContiguousStrides(this.shape, this.strides);
    }

    sharesMemoryWith(other: Tensor): boolean {
        return this.storage.buffer === other.storage.buffer;
    }

    /**
     * 脱离计算图，返回共享 storage 的新张量
     */
    detach(): Tensor<T> {
        return new Tensor({
            dtype: this.dtype,
            shape: this.shape,
            strides: this.strides,
            offset: this.offset,
            storage: this.storage,
        });
    }

    /**
     * 拷贝到指定设备；已在该设备上时返回自身
     */
    to(device: DeviceNameEnum): Tensor<T> {
        if (this.device === device) return this;

        const storage = this.storage.copyTo(device);
        return new Tensor({
            dtype: this.dtype,
            shape: this.shape,
            strides: this.strides,
            offset: this.offset,
            storage,
            requiresGrad: this._requiresGrad,
        });
    }

    /**
     * 确保数据位于宿主内存；已在宿主设备 (js / node) 上时返回自身
     */
    cpu(): Tensor<T> {
        return isHostDevice(this.device) ? this : this.to(DeviceNameEnum.JS);
    }

    /**
     * 将同一段 storage 重新解释为另一个 dtype (零拷贝，无数值转换)
     *
     * 元素大小不同时，最后一维必须 contiguous，并按大小比例缩放:
     * ```ts
     * Tensor.empty([2, 4], 'int16').view('int32').shape; // [2, 2]
     * ```
     */
    view<U extends DType>(dtype: U): Tensor<U> {
        const oldSize = this.elementSize();
        const newSize = getDTypeInfo(dtype).itemSize;
        const requiresGrad = this._requiresGrad && canRequireGrad(dtype);

        if (oldSize === newSize) {
            return new Tensor({
                dtype,
                shape: this.shape,
                strides: this.strides,
                offset: this.offset,
                storage: this.storage,
                requiresGrad,
            });
        }

        if (this.ndim === 0) {
            throw new Error(`view(${dtype}): a 0-dim ${this.dtype} tensor cannot change element size`);
        }
        const last = this.ndim - 1;
        if (this.strides[last] !== 1) {
            throw new Error(`view(${dtype}): the last dimension must be contiguous to change element size`);
        }

        const shape = [...this.shape];
        let strides = [...this.strides];
        let offset = this.offset;

        if (newSize > oldSize) {
            const ratio = newSize / oldSize;
            const divisible = shape[last] % ratio === 0
                && offset % ratio === 0
                && strides.slice(0, last).every(s => s % ratio === 0);
            if (!divisible) {
                throw new Error(
                    `view(${dtype}): shape [${this.shape}] with strides [${this.strides}] and offset ${this.offset} ` +
                    `is not divisible by the element size ratio ${ratio}`
                );
            }
            shape[last] /= ratio;
            strides = strides.map((s, i) => (i === last ? 1 : s / ratio));
            offset /= ratio;
        } else {
            const ratio = oldSize / newSize;
            shape[last] *= ratio;
            strides = strides.map((s, i) => (i === last ? 1 : s * ratio));
            offset *= ratio;
        }

        return new Tensor({ dtype, shape, strides, offset, storage: this.storage, requiresGrad });
    }

    /**
     * 返回共享内存的数组视图 (零拷贝)
     *
     * @throws Error 张量要求梯度，或不在宿主设备上
     * @throws TensorConversionError dtype 在数组库中没有对应
     */
    numpy(): NdArray {
        if (this._requiresGrad) {
            throw new Error("Can't call numpy() on Tensor that requires grad. Use tensor.detach().numpy() instead.");
        }
        if (!isHostDevice(this.device)) {
            throw new Error(`Can't convert ${this.device} device tensor to an array. Use tensor.cpu() first.`);
        }

        const arrayDtype = arrayDtypeFor(this.dtype);
        if (arrayDtype === undefined) {
            throw new TensorConversionError(`Got unsupported dtype ${this.dtype}: no array equivalent`);
        }

        const itemSize = this.elementSize();
        return new NdArray({
            buffer: this.storage.buffer,
            dtype: arrayDtype,
            shape: this.shape,
            strides: this.strides.map(s => s * itemSize),
            byteOffset: this.storage.bufferOffset + this.offset * itemSize,
        });
    }

    /**
     * 元素的原始字节，row-major 顺序
     *
     * contiguous 时为零拷贝视图，否则拷贝。
     */
    bytes(): Uint8Array {
        const itemSize = this.elementSize();
        const base = this.storage.bufferOffset + this.offset * itemSize;
        if (this.isContiguous()) {
            return new Uint8Array(this.storage.buffer, base, this.nbytes);
        }

        const src = new Uint8Array(this.storage.buffer);
        const out = new Uint8Array(this.nbytes);
        const index = new Array<number>(this.ndim).fill(0);
        for (let n = 0; n < this.numel; n++) {
            let elem = 0;
            for (let d = 0; d < this.ndim; d++) elem += index[d] * this.strides[d];
            const start = base + elem * itemSize;
            out.set(src.subarray(start, start + itemSize), n * itemSize);

            for (let d = this.ndim - 1; d >= 0; d--) {
                if (++index[d] < this.shape[d]) break;
                index[d] = 0;
            }
        }
        return out;
    }

    /**
     * 按 DataTypeMap 解释的 TypedArray 视图 (零拷贝，要求 contiguous)
     */
    data(): DataTypeMap[T] {
        if (!this.isContiguous()) {
            throw new Error('data() requires a contiguous tensor');
        }
        const Ctor = getTypedArrayCtor(this.dtype);
        const itemSize = this.elementSize();
        const lanes = itemSize / Ctor.BYTES_PER_ELEMENT;
        return new Ctor(this.storage.buffer, this.storage.bufferOffset + this.offset * itemSize, this.numel * lanes);
    }

    toString(): string {
        return `Tensor(shape=[${this.shape.join(', ')}], dtype=${this.dtype}, device=${this.device})`;
    }
}
