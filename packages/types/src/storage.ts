import { DeviceNameEnum } from "./base";

export type StorageBufferType = ArrayBufferLike;

export interface IStorage {
    readonly storageId: number;
    /**
     * 底层 buffer 引用
     *
     * 可能是调用方持有的共享 buffer (例如从 NdArray 零拷贝包装而来)，
     * 需要配合 bufferOffset 使用来定位实际数据位置。
     */
    readonly buffer: StorageBufferType;
    /**
     * 数据在 buffer 中的字节偏移量
     *
     * 对于独占 buffer 的 storage，这总是 0。
     */
    readonly bufferOffset: number;
    /** 可访问的字节大小 */
    readonly byteLength: number;
    readonly device: DeviceNameEnum;

    /** 拷贝到指定设备上的新 storage */
    copyTo(device: DeviceNameEnum): IStorage;
}
