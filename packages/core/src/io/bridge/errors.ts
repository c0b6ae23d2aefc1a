/**
 * dtype bridge 错误
 *
 * 全部是确定性的类型不匹配，不可重试。每个错误只作用于当前这一个张量，
 * 是否中止整批由调用方决定。
 */

export type DtypeBridgeErrorCode =
    | 'UNSUPPORTED_DTYPE'
    | 'UNREPRESENTABLE_WIDTH'
    | 'UNREPRESENTABLE_DTYPE'
    | 'MISSING_TYPE_TAG'
    | 'INVALID_DTYPE_NAME'
    | 'INVALID_TAG_KIND'
    | 'WIDTH_MISMATCH';

export class DtypeBridgeError extends Error {
    readonly code: DtypeBridgeErrorCode;

    constructor(code: DtypeBridgeErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DtypeBridgeError';
        this.code = code;
    }
}

export function isDtypeBridgeError(value: unknown): value is DtypeBridgeError {
    return value instanceof DtypeBridgeError;
}

/**
 * dtype 需要额外的量化参数 (scale / zero-point) 才能还原，拒绝编码
 */
export class UnsupportedDtypeError extends DtypeBridgeError {
    constructor(readonly dtype: string) {
        super('UNSUPPORTED_DTYPE', `Serialization for ${dtype} is not implemented.`);
        this.name = 'UnsupportedDtypeError';
    }
}

export class UnrepresentableWidthError extends DtypeBridgeError {
    constructor(readonly width: number) {
        super('UNREPRESENTABLE_WIDTH', `Cannot create an array with opaque elements of size ${width} bytes`);
        this.name = 'UnrepresentableWidthError';
    }
}

export class UnrepresentableDtypeError extends DtypeBridgeError {
    constructor(readonly arrayDtype: string, options?: { cause?: unknown }) {
        super('UNREPRESENTABLE_DTYPE', `Cannot serialize an array with dtype ${arrayDtype} as a tagged array.`, options);
        this.name = 'UnrepresentableDtypeError';
    }
}

export class MissingTypeTagError extends DtypeBridgeError {
    constructor(message: string) {
        super('MISSING_TYPE_TAG', message);
        this.name = 'MissingTypeTagError';
    }
}

export class InvalidDtypeNameError extends DtypeBridgeError {
    constructor(readonly dtypeName: string, reason: string) {
        super('INVALID_DTYPE_NAME', `Invalid tensor dtype name ${JSON.stringify(dtypeName)}: ${reason}`);
        this.name = 'InvalidDtypeNameError';
    }
}

/**
 * dtype 标签不是字符串 (调用方 bug)
 */
export class DtypeTagKindError extends DtypeBridgeError {
    constructor(readonly received: string) {
        super('INVALID_TAG_KIND', `tensor dtype tag must be a string, got ${received}`);
        this.name = 'DtypeTagKindError';
    }
}

/**
 * opaque 元素宽度与 tensor dtype 的元素宽度不一致
 */
export class DtypeWidthMismatchError extends DtypeBridgeError {
    constructor(readonly arrayDtype: string, readonly tensorDtype: string) {
        super('WIDTH_MISMATCH', `Opaque dtype ${arrayDtype} does not match the element size of ${tensorDtype}`);
        this.name = 'DtypeWidthMismatchError';
    }
}
