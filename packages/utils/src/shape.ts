import { Shape } from "@tensorweave/types";

export function computeStrides(shape: Shape): number[] {
    const strides = new Array<number>(shape.length);
    let stride = 1;
    for (let i = shape.length - 1; i >= 0; i--) {
        strides[i] = stride;
        stride *= shape[i];
    }
    return strides;
}

export function computeNumel(shape: Shape): number {
    return shape.reduce((a: number, b: number) => a * b, 1);
}

/**
 * 校验 shape: 每一维都必须是非负整数
 */
export function assertValidShape(shape: Shape): void {
    for (const dim of shape) {
        if (!Number.isSafeInteger(dim) || dim < 0) {
            throw new RangeError(`Invalid shape ${JSON.stringify(shape)}: dimensions must be non-negative integers`);
        }
    }
}

/**
 * 检查 strides 是否是 row-major contiguous
 *
 * 连续条件：strides[i] = product(shape[i+1:])，大小为 1 的维度不参与比较
 */
export function isContiguousStrides(
    shape: readonly number[],
    strides: readonly number[]
): boolean {
    if (shape.length === 0) {
        // 标量永远连续
        return true;
    }

    if (shape.length !== strides.length) {
        return false;
    }

    let expectedStride = 1;
    for (let i = shape.length - 1; i >= 0; i--) {
        if (shape[i] !== 1) {
            if (strides[i] !== expectedStride) {
                return false;
            }
        }
        expectedStride *= shape[i];
    }

    return true;
}
