/**
 * 数组库 dtype 描述符解析
 *
 * 描述符格式: [byte order][kind][size]
 * - byte order: '<' (little), '>' (big), '=' (native), '|' (not applicable), 或省略
 * - kind: 'b' 'i' 'u' 'f' 'c' 'V' 'S' 'U' 'O' 'M' 'm'
 * - size: 字节数；'U' 例外，按字符计 (每字符 4 字节)
 *
 * parseArrayDtype / formatArrayDtype 逐字保留 byte order 标记，
 * ArrayDType 则是规范化后的形式 (与 .str 输出一致)。
 */

import type { ArrayDTypeDescriptor, ArrayDTypeKind, ByteOrderChar } from '@tensorweave/types';

/** 宿主字节序，模块加载时检测一次 */
export const HOST_BYTE_ORDER: '<' | '>' = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1 ? '<' : '>';

export class ArrayDTypeError extends TypeError {
    constructor(descr: string, reason: string) {
        super(`data type '${descr}' not understood: ${reason}`);
        this.name = 'ArrayDTypeError';
    }
}

const DESCR_PATTERN = /^([<>=|]?)([biufcVSUOMm])(\d+)$/;

// kind → 允许的字节数 (undefined 表示任意非负值)
const VALID_SIZES: Partial<Record<ArrayDTypeKind, readonly number[]>> = {
    b: [1],
    i: [1, 2, 4, 8],
    u: [1, 2, 4, 8],
    f: [2, 4, 8, 16],
    c: [8, 16, 32],
    O: [8],
    M: [8],
    m: [8],
};

// 这些 kind 没有字节序概念，规范形式总是 '|'
const ORDERLESS_KINDS: ReadonlySet<ArrayDTypeKind> = new Set<ArrayDTypeKind>(['b', 'V', 'S', 'O']);

function isByteOrderChar(value: string): value is ByteOrderChar {
    return value === '<' || value === '>' || value === '=' || value === '|' || value === '';
}

function isArrayDTypeKind(value: string): value is ArrayDTypeKind {
    return 'biufcVSUOMm'.includes(value) && value.length === 1;
}

/**
 * 解析描述符字符串，保留原样的 byte order 标记
 *
 * @throws ArrayDTypeError 格式错误或该 kind 不支持此大小
 */
export function parseArrayDtype(descr: string): ArrayDTypeDescriptor {
    const match = DESCR_PATTERN.exec(descr);
    if (!match) {
        throw new ArrayDTypeError(descr, 'expected [<>=|]<kind><size>');
    }
    const [, order, kind, digits] = match;
    if (!isByteOrderChar(order) || !isArrayDTypeKind(kind)) {
        throw new ArrayDTypeError(descr, 'unknown byte order or kind');
    }

    const count = parseInt(digits, 10);
    const itemSize = kind === 'U' ? count * 4 : count;

    const allowed = VALID_SIZES[kind];
    if (allowed && !allowed.includes(itemSize)) {
        throw new ArrayDTypeError(descr, `kind '${kind}' has no ${itemSize}-byte variant`);
    }

    return { byteOrder: order, kind, itemSize };
}

/**
 * parseArrayDtype 的逆操作
 */
export function formatArrayDtype(descr: ArrayDTypeDescriptor): string {
    const count = descr.kind === 'U' ? descr.itemSize / 4 : descr.itemSize;
    return `${descr.byteOrder}${descr.kind}${count}`;
}

function canonicalByteOrder(descr: ArrayDTypeDescriptor): '<' | '>' | '|' {
    if (ORDERLESS_KINDS.has(descr.kind)) return '|';
    if (descr.itemSize === 1 && (descr.kind === 'i' || descr.kind === 'u')) return '|';
    if (descr.byteOrder === '>') return '>';
    if (descr.byteOrder === '<') return '<';
    // '=', '|' 或省略: 视为宿主字节序
    return HOST_BYTE_ORDER;
}

const KIND_NAMES: Record<ArrayDTypeKind, string> = {
    b: 'bool',
    i: 'int',
    u: 'uint',
    f: 'float',
    c: 'complex',
    V: 'void',
    S: 'bytes',
    U: 'str',
    O: 'object',
    M: 'datetime',
    m: 'timedelta',
};

/**
 * 规范化的数组 dtype
 *
 * @example
 * ArrayDType.from('=f4').str  // '<f4'
 * ArrayDType.from('<V2').str  // '|V2'
 * ArrayDType.from('<i1').name // 'int8'
 */
export class ArrayDType implements ArrayDTypeDescriptor {
    readonly byteOrder: '<' | '>' | '|';
    readonly kind: ArrayDTypeKind;
    readonly itemSize: number;

    private constructor(descr: ArrayDTypeDescriptor) {
        this.byteOrder = canonicalByteOrder(descr);
        this.kind = descr.kind;
        this.itemSize = descr.itemSize;
    }

    static from(dtype: string | ArrayDTypeDescriptor): ArrayDType {
        if (dtype instanceof ArrayDType) return dtype;
        return new ArrayDType(typeof dtype === 'string' ? parseArrayDtype(dtype) : dtype);
    }

    /** 规范描述符字符串, e.g. '<f4' */
    get str(): string {
        return formatArrayDtype(this);
    }

    /** 人类可读名字, e.g. 'float32', 'void16', 'str128' */
    get name(): string {
        switch (this.kind) {
            case 'b':
            case 'O':
                return KIND_NAMES[this.kind];
            case 'M':
            case 'm':
                return `${KIND_NAMES[this.kind]}64`;
            default:
                return `${KIND_NAMES[this.kind]}${this.itemSize * 8}`;
        }
    }

    /** 数据能否按宿主字节序直接读取 */
    get isNativeOrder(): boolean {
        return this.byteOrder === '|' || this.byteOrder === HOST_BYTE_ORDER;
    }

    toString(): string {
        return this.str;
    }
}
