import { DeviceNameEnum, IStorage } from "@tensorweave/types";
import { nextStorageId } from "@tensorweave/utils";

const HOST_DEVICES: ReadonlySet<DeviceNameEnum> = new Set([DeviceNameEnum.JS, DeviceNameEnum.Node]);

/**
 * 数据是否可由 JS 直接寻址
 */
export function isHostDevice(device: DeviceNameEnum): boolean {
    return HOST_DEVICES.has(device);
}

/**
 * Storage - 一段字节区域 + 其所在设备
 *
 * 非宿主设备 (webgpu / wasm) 的 storage 同样以 ArrayBuffer 持有字节，
 * 但 Tensor 在这些设备上不提供零拷贝的 host 视图，必须先 cpu()。
 */
export class Storage implements IStorage {
    readonly storageId: number = nextStorageId();

    constructor(
        readonly buffer: ArrayBufferLike,
        readonly bufferOffset: number,
        readonly byteLength: number,
        readonly device: DeviceNameEnum,
    ) {
        if (bufferOffset < 0 || bufferOffset + byteLength > buffer.byteLength) {
            throw new RangeError(
                `Storage range [${bufferOffset}, ${bufferOffset + byteLength}) exceeds buffer of ${buffer.byteLength} bytes`
            );
        }
    }

    /**
     * 分配独占的新 buffer
     */
    static allocate(byteLength: number, device: DeviceNameEnum): Storage {
        return new Storage(new ArrayBuffer(byteLength), 0, byteLength, device);
    }

    /**
     * 包装调用方的 buffer (零拷贝)
     */
    static wrap(buffer: ArrayBufferLike, bufferOffset: number, byteLength: number, device: DeviceNameEnum = DeviceNameEnum.JS): Storage {
        return new Storage(buffer, bufferOffset, byteLength, device);
    }

    bytes(): Uint8Array {
        return new Uint8Array(this.buffer, this.bufferOffset, this.byteLength);
    }

    /**
     * 拷贝到另一设备
     */
    copyTo(device: DeviceNameEnum): Storage {
        const copy = Storage.allocate(this.byteLength, device);
        copy.bytes().set(this.bytes());
        return copy;
    }
}
