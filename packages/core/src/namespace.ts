/**
 * Tensor dtype 命名空间
 *
 * dtype 以 "torch.<name>" 的字符串形式跨越序列化边界，
 * 与 PyTorch 写出的文件保持兼容。这里是命名空间的属性表:
 * 除 dtype 与别名外，还有 memory format、数学常量等非 dtype 成员。
 */

import { DType, MemoryFormat, TYPE_REGISTRY } from "@tensorweave/types";
import { isDType } from "@tensorweave/utils";

export const DTYPE_NAMESPACE = 'torch';

export type NamespaceValue = DType | MemoryFormat | number;

const DTYPE_ALIASES: ReadonlyArray<readonly [string, DType]> = [
    ['float', 'float32'],
    ['double', 'float64'],
    ['half', 'float16'],
    ['cfloat', 'complex64'],
    ['cdouble', 'complex128'],
    ['chalf', 'complex32'],
    ['long', 'int64'],
    ['int', 'int32'],
    ['short', 'int16'],
];

const NAMESPACE_MEMBERS: ReadonlyMap<string, NamespaceValue> = new Map<string, NamespaceValue>([
    ...Object.keys(TYPE_REGISTRY).filter(isDType).map(d => [d, d] as const),
    ...DTYPE_ALIASES,
    ['contiguous_format', MemoryFormat.Contiguous],
    ['channels_last', MemoryFormat.ChannelsLast],
    ['channels_last_3d', MemoryFormat.ChannelsLast3d],
    ['preserve_format', MemoryFormat.Preserve],
    ['pi', Math.PI],
    ['e', Math.E],
    ['inf', Infinity],
    ['nan', NaN],
]);

/**
 * 按名字查找命名空间成员，不存在时返回 undefined
 */
export function getNamespaceMember(identifier: string): NamespaceValue | undefined {
    return NAMESPACE_MEMBERS.get(identifier);
}

/**
 * dtype 的规范字符串名
 *
 * @example dtypeToString('bfloat16') // 'torch.bfloat16'
 */
export function dtypeToString(dtype: DType): string {
    return `${DTYPE_NAMESPACE}.${dtype}`;
}
