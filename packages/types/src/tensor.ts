import { DeviceNameEnum, DType, Shape } from "./base";
import { IStorage } from "./storage";

export interface TensorOptions {
    /**
     * The data type of the tensor. Defaults to 'float32'.
     */
    dtype?: DType;
    /**
     * The device to store the tensor on. Defaults to the environment's default device.
     */
    device?: DeviceNameEnum;
    /**
     * Whether autograd should record operations on the returned tensor.
     */
    requiresGrad?: boolean;
}

/**
 * Tensor 的完整描述，直接构造 view 时使用
 *
 * strides 与 offset 均以元素为单位 (不是字节)。
 */
export interface TensorInit<T extends DType = DType> {
    readonly dtype: T;
    readonly shape: Shape;
    readonly storage: IStorage;
    /** @default contiguous row-major strides */
    readonly strides?: readonly number[];
    /** @default 0 */
    readonly offset?: number;
    /** @default false */
    readonly requiresGrad?: boolean;
}
