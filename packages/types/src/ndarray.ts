/**
 * 数组库 dtype 描述符类型
 *
 * 描述符格式 (array protocol typestr): [byte order][kind][item size]
 * - byte order: '<' (little), '>' (big), '=' (native), '|' (not applicable), 或省略
 * - kind: 见 ArrayDTypeKind
 * - item size: 每元素字节数
 *
 * @example '<f4', '|u1', '<V2', '>i8'
 */

export type ByteOrderChar = '<' | '>' | '=' | '|' | '';

/**
 * - 'b' bool, 'i' signed int, 'u' unsigned int, 'f' float, 'c' complex
 * - 'V' raw bytes (void), 'S' bytes string, 'U' unicode string
 * - 'O' object, 'M' datetime, 'm' timedelta
 */
export type ArrayDTypeKind = 'b' | 'i' | 'u' | 'f' | 'c' | 'V' | 'S' | 'U' | 'O' | 'M' | 'm';

export interface ArrayDTypeDescriptor {
    readonly byteOrder: ByteOrderChar;
    readonly kind: ArrayDTypeKind;
    readonly itemSize: number;
}
