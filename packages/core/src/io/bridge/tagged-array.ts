/**
 * TaggedArray - 张量与数组库之间的 dtype / 布局桥
 *
 * 序列化时把张量转成 (数组, 数组 dtype 字符串, 张量 dtype 字符串)；
 * 数组库无法表示的 dtype 以同宽 opaque 字节块 ('V' kind) 编码，
 * 真实类型记录在 tensorDtype 中，解码时按原字节重新解释。
 *
 * 所有路径都是零拷贝: 数组与张量共享同一段内存，
 * buffer 的生命周期由调用方保证。
 */

import type { DType, ShapeLike } from '@tensorweave/types';
import { getDtypeBytes, Logger } from '@tensorweave/utils';
import { dtypeToString } from '../../namespace';
import { NdArray } from '../../ndarray';
import { Tensor, TensorConversionError } from '../../tensor';
import { decoderDtype, encoderDtype, intermediateDtype, isAsymmetric, isOpaque, isUnsupported } from './classify';
import { DtypeWidthMismatchError, MissingTypeTagError, UnrepresentableDtypeError, UnsupportedDtypeError } from './errors';
import { resolveTensorDtype } from './resolve';

const logger = new Logger('IO-Bridge').child('encode');

/**
 * 每个张量写进容器头部的两个 dtype 字符串
 */
export interface DtypeTags {
    /** 数组 dtype 描述符, e.g. '<f4', '<V2' */
    readonly arrayDtype: string;
    /** 张量 dtype 名, e.g. 'torch.bfloat16'；纯数组来源且无张量语义时缺省 */
    readonly tensorDtype?: string;
}

export class TaggedArray implements DtypeTags {

    private constructor(
        readonly data: NdArray,
        readonly arrayDtype: string,
        readonly tensorDtype?: string,
    ) { }

    /**
     * 从原始 buffer 解码 (读取路径)
     *
     * @param arrayDtype - 容器中记录的数组 dtype (可能是 opaque)
     * @param tensorDtype - 容器中记录的张量 dtype 名
     * @param shape - 数组形状
     * @param buffer - 原始字节；ArrayBufferView 的 byteOffset 会被计入
     * @param offset - 数据起始的字节偏移
     * @returns 可调用 toTensor() 的 TaggedArray，data 借用 buffer
     *
     * @example
     * const tagged = TaggedArray.fromBuffer('<V2', 'torch.bfloat16', [2, 3], bytes);
     * const tensor = tagged.toTensor(); // bfloat16, shape [2, 3]
     */
    static fromBuffer(
        arrayDtype: string,
        tensorDtype: string | undefined,
        shape: ShapeLike,
        buffer: ArrayBufferLike | ArrayBufferView,
        offset: number = 0
    ): TaggedArray {
        const data = NdArray.fromBuffer(buffer, shape, decoderDtype(arrayDtype), offset);
        return new TaggedArray(data, arrayDtype, tensorDtype);
    }

    /**
     * 从张量编码 (写入路径)
     *
     * 数组库有对应 dtype 时直接取共享内存的数组视图；否则按元素宽度
     * 重新解释为整数，再把数组 dtype 标成 opaque。
     *
     * @throws UnsupportedDtypeError 量化类型
     * @throws UnrepresentableWidthError 需要 opaque 编码但元素宽度不在 {1, 2, 4, 8}
     */
    static fromTensor(tensor: Tensor): TaggedArray {
        if (isUnsupported(tensor.dtype)) {
            throw new UnsupportedDtypeError(dtypeToString(tensor.dtype));
        }
        const tensorDtype = dtypeToString(tensor.dtype);
        const host = tensor.cpu().detach();

        if (!isAsymmetric(host.dtype)) {
            try {
                const arr = host.numpy();
                return new TaggedArray(arr, arr.dtype.str, tensorDtype);
            } catch (e) {
                // 不在 asymmetric 表里，但数组库也无法表示 (如 float8)，
                // 退回 opaque 编码
                if (!(e instanceof TensorConversionError)) throw e;
                logger.debug(`${tensorDtype} has no array equivalent, falling back to opaque encoding`);
            }
        }

        const arr = host.view(intermediateDtype(host.elementSize())).numpy();
        const arrayDtype = encoderDtype(arr.dtype.str);
        logger.debug(`opaque encoding for ${tensorDtype} as ${arrayDtype}`);
        return new TaggedArray(arr, arrayDtype, tensorDtype);
    }

    /**
     * 从数组编码
     *
     * 数据原样保留，只补上张量 dtype。先用零维探针数组确认
     * 该 dtype 能转回张量，否则写出去的数据以后无法还原。
     *
     * @throws UnrepresentableDtypeError 数组 dtype 没有对应的张量 dtype
     */
    static fromArray(array: NdArray): TaggedArray {
        let dtype: DType;
        try {
            dtype = Tensor.fromNumpy(NdArray.empty([], array.dtype)).dtype;
        } catch (e) {
            if (e instanceof TensorConversionError) {
                throw new UnrepresentableDtypeError(array.dtype.name, { cause: e });
            }
            throw e;
        }
        return new TaggedArray(array, array.dtype.str, dtypeToString(dtype));
    }

    static from(value: Tensor | NdArray): TaggedArray {
        return value instanceof Tensor ? TaggedArray.fromTensor(value) : TaggedArray.fromArray(value);
    }

    /**
     * data 是否是 opaque 编码，需要 toTensor() 才能解释
     */
    get isOpaque(): boolean {
        return isOpaque(this.arrayDtype);
    }

    /**
     * 还原为张量，与 data 共享内存
     *
     * @throws MissingTypeTagError opaque 数据缺少 tensorDtype
     */
    toTensor(): Tensor {
        if (!this.isOpaque) {
            return Tensor.fromNumpy(this.data);
        }
        if (!this.tensorDtype) {
            throw new MissingTypeTagError(
                'Tried to decode a tensor stored as opaque data, but no tensor dtype was specified'
            );
        }

        const dtype = resolveTensorDtype(this.tensorDtype);
        if (getDtypeBytes(dtype) !== this.data.itemSize) {
            throw new DtypeWidthMismatchError(this.arrayDtype, this.tensorDtype);
        }
        return Tensor.fromNumpy(this.data).view(dtype);
    }

    tags(): DtypeTags {
        return this.tensorDtype === undefined
            ? { arrayDtype: this.arrayDtype }
            : { arrayDtype: this.arrayDtype, tensorDtype: this.tensorDtype };
    }
}
