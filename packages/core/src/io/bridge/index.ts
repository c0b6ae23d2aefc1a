export { TaggedArray } from './tagged-array';
export type { DtypeTags } from './tagged-array';
export {
    ASYMMETRIC_TYPES,
    UNSUPPORTED_TYPES,
    decoderDtype,
    encoderDtype,
    intermediateDtype,
    isAsymmetric,
    isOpaque,
    isUnsupported,
} from './classify';
export { resolveTensorDtype } from './resolve';
export {
    DtypeBridgeError,
    DtypeTagKindError,
    DtypeWidthMismatchError,
    InvalidDtypeNameError,
    MissingTypeTagError,
    UnrepresentableDtypeError,
    UnrepresentableWidthError,
    UnsupportedDtypeError,
    isDtypeBridgeError,
} from './errors';
export type { DtypeBridgeErrorCode } from './errors';
