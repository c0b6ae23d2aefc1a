/**
 * dtype 分类
 *
 * asymmetric: 数组库中没有对应 dtype，只能以 opaque 字节块编码。
 * unsupported: asymmetric 的子集，还需要量化参数，直接拒绝。
 *
 * 两张表是硬编码的，对应 TYPE_REGISTRY 当前的 dtype 集合 (PyTorch 2.x)。
 * TYPE_REGISTRY 新增 dtype 时需要同步检查。
 */

import type { DType } from '@tensorweave/types';
import { formatArrayDtype, parseArrayDtype } from '../../ndarray';
import { UnrepresentableWidthError } from './errors';

export const ASYMMETRIC_TYPES: ReadonlySet<DType> = new Set<DType>([
    'bfloat16',
    'quint8',
    'qint8',
    'qint32',
    'quint4x2',
    'quint2x4',
    'complex32',
]);

export const UNSUPPORTED_TYPES: ReadonlySet<DType> = new Set<DType>([
    'quint8',
    'qint8',
    'qint32',
    'quint4x2',
    'quint2x4',
]);

// opaque 编码时借用的同宽整数类型
const INTERMEDIATE_MAPPING: ReadonlyMap<number, DType> = new Map<number, DType>([
    [1, 'int8'],
    [2, 'int16'],
    [4, 'int32'],
    [8, 'int64'],
]);

/**
 * 数组 dtype 是否是 opaque 编码 (kind 'V')
 */
export function isOpaque(arrayDtype: string): boolean {
    return parseArrayDtype(arrayDtype).kind === 'V';
}

export function isAsymmetric(dtype: DType): boolean {
    return ASYMMETRIC_TYPES.has(dtype);
}

export function isUnsupported(dtype: DType): boolean {
    return UNSUPPORTED_TYPES.has(dtype);
}

/**
 * 按元素字节数选择同宽整数类型
 *
 * @throws UnrepresentableWidthError 宽度不在 {1, 2, 4, 8}
 */
export function intermediateDtype(size: number): DType {
    const dtype = INTERMEDIATE_MAPPING.get(size);
    if (dtype === undefined) {
        throw new UnrepresentableWidthError(size);
    }
    return dtype;
}

/**
 * '<i2' → '<V2'，字节序标记与宽度不变
 */
export function encoderDtype(intDtype: string): string {
    const descr = parseArrayDtype(intDtype);
    if (descr.kind !== 'i') {
        throw new TypeError(`encoderDtype expects a signed integer dtype, got ${intDtype}`);
    }
    return formatArrayDtype({ ...descr, kind: 'V' });
}

/**
 * 把 opaque dtype 换回同宽整数 ('<V2' → '<i2')，非 opaque 原样返回
 *
 * 不能直接用 'V' dtype 从 buffer 构造数组: 数组库对 'V' kind 不处理字节序，
 * 换成 'i' 之后字节序才会被正确保留。
 */
export function decoderDtype(arrayDtype: string): string {
    const descr = parseArrayDtype(arrayDtype);
    if (descr.kind !== 'V') {
        return arrayDtype;
    }
    return formatArrayDtype({ ...descr, kind: 'i' });
}
