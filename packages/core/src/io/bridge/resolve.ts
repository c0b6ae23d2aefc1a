import type { DType } from '@tensorweave/types';
import { isDType } from '@tensorweave/utils';
import { DTYPE_NAMESPACE, dtypeToString, getNamespaceMember } from '../../namespace';
import { ASYMMETRIC_TYPES } from './classify';
import { DtypeTagKindError, InvalidDtypeNameError, MissingTypeTagError } from './errors';

// 常见情况直接查表，不做字符串解析
const DECODE_MAPPING: ReadonlyMap<string, DType> = new Map(
    [...ASYMMETRIC_TYPES].map(dtype => [dtypeToString(dtype), dtype] as const)
);

function describeKind(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * 把 "torch.<name>" 形式的 dtype 名解析为 DType
 *
 * 别名会解析到规范 dtype: `resolveTensorDtype('torch.half') === 'float16'`。
 *
 * @throws MissingTypeTagError 名字为空或缺失
 * @throws DtypeTagKindError 不是字符串
 * @throws InvalidDtypeNameError 命名空间不对、格式错误、或解析结果不是 dtype
 */
export function resolveTensorDtype(name: unknown): DType {
    if (name === undefined || name === null || name === '') {
        throw new MissingTypeTagError('Cannot decode an empty dtype.');
    }
    if (typeof name !== 'string') {
        throw new DtypeTagKindError(describeKind(name));
    }

    const fast = DECODE_MAPPING.get(name);
    if (fast !== undefined) {
        return fast;
    }

    const [namespace, ...rest] = name.split('.');
    if (namespace !== DTYPE_NAMESPACE) {
        throw new InvalidDtypeNameError(name, `expected the "${DTYPE_NAMESPACE}." namespace`);
    }
    if (rest.length !== 1 || rest[0] === '') {
        throw new InvalidDtypeNameError(name, `expected "${DTYPE_NAMESPACE}.<dtype>"`);
    }

    const member = getNamespaceMember(rest[0]);
    if (member === undefined) {
        throw new InvalidDtypeNameError(name, `"${rest[0]}" not found in ${DTYPE_NAMESPACE}`);
    }
    if (!isDType(member)) {
        throw new InvalidDtypeNameError(name, `${name} is not a dtype`);
    }
    return member;
}
