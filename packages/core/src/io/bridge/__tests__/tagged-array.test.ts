import { DeviceNameEnum } from "@tensorweave/types"
import { LogLevel, getDtypeBytes } from "@tensorweave/utils"
import { env } from "../../../env"
import { arrayDtypeFor } from "../../../interop"
import { NdArray } from "../../../ndarray"
import { Storage } from "../../../storage"
import { Tensor, TensorConversionError } from "../../../tensor"
import { TaggedArray } from "../tagged-array"
import {
  DtypeWidthMismatchError,
  InvalidDtypeNameError,
  MissingTypeTagError,
  UnrepresentableDtypeError,
  UnsupportedDtypeError,
} from "../errors"

function iota(length: number, start = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => start + i)
}

const SYMMETRIC = [
  "bool",
  "uint8",
  "int8",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "int64",
  "uint64",
  "float16",
  "float32",
  "float64",
  "complex64",
  "complex128",
] as const

describe("TaggedArray", () => {
  describe("fromTensor", () => {
    it.each(SYMMETRIC)("encodes %s natively and round-trips", (dtype) => {
      const size = getDtypeBytes(dtype)
      const t = Tensor.fromBytes(iota(6 * size), [2, 3], dtype)

      const tagged = TaggedArray.fromTensor(t)

      expect(tagged.isOpaque).toBe(false)
      expect(tagged.arrayDtype).toBe(arrayDtypeFor(dtype)?.str)
      expect(tagged.tensorDtype).toBe(`torch.${dtype}`)
      expect(tagged.data.buffer).toBe(t.storage.buffer)

      const back = tagged.toTensor()
      expect(back.dtype).toBe(dtype)
      expect(back.shape).toEqual([2, 3])
      expect(back.sharesMemoryWith(t)).toBe(true)
      expect(back.bytes()).toEqual(t.bytes())
    })

    it("encodes bfloat16 as 2-byte opaque elements", () => {
      const t = Tensor.fromBytes(iota(12), [2, 3], "bfloat16")

      const tagged = TaggedArray.fromTensor(t)

      expect(tagged.arrayDtype).toBe("<V2")
      expect(tagged.tensorDtype).toBe("torch.bfloat16")
      expect(tagged.isOpaque).toBe(true)
      expect(tagged.data.dtype.str).toBe("<i2")
      expect(tagged.data.shape).toEqual([2, 3])

      const back = tagged.toTensor()
      expect(back.dtype).toBe("bfloat16")
      expect(back.shape).toEqual([2, 3])
      expect(back.bytes()).toEqual(iota(12))
    })

    it("encodes complex32 as 4-byte opaque elements", () => {
      const t = Tensor.fromBytes(iota(8), [2], "complex32")

      const tagged = TaggedArray.fromTensor(t)

      expect(tagged.arrayDtype).toBe("<V4")
      expect(tagged.data.dtype.str).toBe("<i4")
      expect(tagged.toTensor().dtype).toBe("complex32")
      expect(tagged.toTensor().bytes()).toEqual(iota(8))
    })

    it.each(["float8_e4m3fn", "float8_e5m2"] as const)(
      "falls back to opaque encoding for %s",
      (dtype) => {
        const t = Tensor.fromBytes(iota(4), [4], dtype)

        const tagged = TaggedArray.fromTensor(t)

        expect(tagged.arrayDtype).toBe("|V1")
        expect(tagged.tensorDtype).toBe(`torch.${dtype}`)
        expect(tagged.toTensor().dtype).toBe(dtype)
        expect(tagged.toTensor().bytes()).toEqual(iota(4))
      },
    )

    it.each(["quint8", "qint8", "qint32", "quint4x2", "quint2x4"] as const)(
      "refuses to encode %s",
      (dtype) => {
        const t = Tensor.empty([2], dtype)

        expect(() => TaggedArray.fromTensor(t)).toThrow(UnsupportedDtypeError)
        expect(() => TaggedArray.fromTensor(t)).toThrow(`Serialization for torch.${dtype} is not implemented.`)
      },
    )

    it("copies tensors off a non-host device", () => {
      const t = Tensor.fromBytes(iota(4), [2], "bfloat16", { device: DeviceNameEnum.WebGPU })

      const tagged = TaggedArray.fromTensor(t)

      expect(tagged.data.buffer).not.toBe(t.storage.buffer)
      expect(tagged.toTensor().bytes()).toEqual(iota(4))
      expect(tagged.toTensor().device).toBe(DeviceNameEnum.JS)
    })

    it("encodes tensors that require grad without copying", () => {
      const t = Tensor.fromBytes(new Float32Array([1.5, -2]), [2], "float32", { requiresGrad: true })

      const tagged = TaggedArray.fromTensor(t)

      expect(t.requiresGrad).toBe(true)
      expect(tagged.data.buffer).toBe(t.storage.buffer)
      expect(tagged.toTensor().requiresGrad).toBe(false)
    })

    it("keeps the layout of non-contiguous tensors", () => {
      const storage = Storage.wrap(iota(12).buffer, 0, 12)
      const t = new Tensor({ dtype: "bfloat16", shape: [3, 2], strides: [1, 3], storage })

      const tagged = TaggedArray.fromTensor(t)
      const back = tagged.toTensor()

      expect(tagged.data.strides).toEqual([2, 6])
      expect(back.strides).toEqual([1, 3])
      expect(back.bytes()).toEqual(Uint8Array.from([0, 1, 6, 7, 2, 3, 8, 9, 4, 5, 10, 11]))
    })
  })

  describe("fromBuffer", () => {
    it("decodes opaque data with a tensor dtype tag", () => {
      const tagged = TaggedArray.fromBuffer("<V4", "torch.complex32", [4], iota(16, 1).buffer)

      expect(tagged.isOpaque).toBe(true)
      expect(tagged.data.dtype.str).toBe("<i4")

      const t = tagged.toTensor()
      expect(t.dtype).toBe("complex32")
      expect(t.shape).toEqual([4])
      expect(t.bytes()).toEqual(iota(16, 1))
    })

    it("honours a byte offset", () => {
      const tagged = TaggedArray.fromBuffer("<V4", "torch.complex32", [2], iota(20).buffer, 4)

      expect(tagged.toTensor().bytes()).toEqual(iota(8, 4))
    })

    it("honours the byte offset of a view", () => {
      const tagged = TaggedArray.fromBuffer("<V2", "torch.bfloat16", [3], iota(20).subarray(8))

      expect(tagged.toTensor().bytes()).toEqual(iota(6, 8))
    })

    it("rejects a negative offset into a view", () => {
      const view = iota(16).subarray(8)

      expect(() => TaggedArray.fromBuffer("<V2", "torch.bfloat16", [2], view, -4)).toThrow(RangeError)
      expect(() => TaggedArray.fromBuffer("<V2", "torch.bfloat16", [2], view, -4)).toThrow("Invalid byte offset -4")
    })

    it("decodes plain arrays without a tensor dtype tag", () => {
      const tagged = TaggedArray.fromBuffer("<f4", undefined, [2], new Float32Array([0.5, 4]))

      expect(tagged.isOpaque).toBe(false)
      expect(tagged.tags()).toEqual({ arrayDtype: "<f4" })
      expect(Array.from<number | bigint>(tagged.toTensor().data())).toEqual([0.5, 4])
    })

    it("keeps the byte order marker of opaque data", () => {
      const tagged = TaggedArray.fromBuffer(">V2", "torch.bfloat16", [2], iota(4))

      expect(tagged.arrayDtype).toBe(">V2")
      expect(tagged.data.dtype.str).toBe(">i2")
      expect(() => tagged.toTensor()).toThrow(TensorConversionError)
    })

    it("requires a tensor dtype for opaque data", () => {
      for (const tag of [undefined, ""]) {
        const tagged = TaggedArray.fromBuffer("<V2", tag, [2], iota(4))
        expect(() => tagged.toTensor()).toThrow(MissingTypeTagError)
        expect(() => tagged.toTensor()).toThrow(
          "Tried to decode a tensor stored as opaque data, but no tensor dtype was specified",
        )
      }
    })

    it("rejects a tensor dtype of another width", () => {
      const tagged = TaggedArray.fromBuffer("<V2", "torch.complex32", [2], iota(4))

      expect(() => tagged.toTensor()).toThrow(DtypeWidthMismatchError)
      expect(() => tagged.toTensor()).toThrow("Opaque dtype <V2 does not match the element size of torch.complex32")
    })

    it("rejects invalid tensor dtype names", () => {
      const tagged = TaggedArray.fromBuffer("<V2", "numpy.int16", [2], iota(4))

      expect(() => tagged.toTensor()).toThrow(InvalidDtypeNameError)
    })
  })

  describe("fromArray", () => {
    it("tags an array with its tensor dtype and keeps the data", () => {
      const arr = NdArray.fromBuffer(new Float32Array([1.5, -2]), [2], "<f4")

      const tagged = TaggedArray.fromArray(arr)

      expect(tagged.data).toBe(arr)
      expect(tagged.arrayDtype).toBe("<f4")
      expect(tagged.tensorDtype).toBe("torch.float32")
      expect(tagged.isOpaque).toBe(false)
    })

    it("records the canonical descriptor", () => {
      const arr = NdArray.fromBuffer(new Float32Array([1]), [1], "=f4")

      expect(TaggedArray.fromArray(arr).arrayDtype).toBe("<f4")
    })

    it("rejects arrays with no tensor equivalent", () => {
      const arr = NdArray.empty([2], "<U4")

      let caught: unknown
      try {
        TaggedArray.fromArray(arr)
      } catch (e) {
        caught = e
      }

      expect(caught).toBeInstanceOf(UnrepresentableDtypeError)
      expect(caught).toMatchObject({
        code: "UNREPRESENTABLE_DTYPE",
        message: "Cannot serialize an array with dtype str128 as a tagged array.",
      })
      expect(caught instanceof Error && caught.cause).toBeInstanceOf(TensorConversionError)
    })

    it("rejects byte-swapped arrays", () => {
      const arr = NdArray.empty([2], ">f4")

      expect(() => TaggedArray.fromArray(arr)).toThrow(
        "Cannot serialize an array with dtype float32 as a tagged array.",
      )
    })
  })

  describe("from", () => {
    it("dispatches on the input kind", () => {
      const t = Tensor.empty([2], "bfloat16")
      const arr = NdArray.empty([2], "<i8")

      expect(TaggedArray.from(t).arrayDtype).toBe("<V2")
      expect(TaggedArray.from(arr).tensorDtype).toBe("torch.int64")
    })
  })

  it("reports both tags", () => {
    const tagged = TaggedArray.fromTensor(Tensor.empty([1], "complex32"))

    expect(tagged.tags()).toEqual({ arrayDtype: "<V4", tensorDtype: "torch.complex32" })
  })

  describe("logging", () => {
    afterEach(() => {
      env.setLogLevel(LogLevel.WARN)
    })

    it("logs opaque encodings at debug level", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined)
      env.setLogLevel("debug")

      TaggedArray.fromTensor(Tensor.empty([1], "bfloat16"))

      expect(log).toHaveBeenCalledWith("[IO-Bridge:encode]", "opaque encoding for torch.bfloat16 as <V2")
    })

    it("logs the fallback for dtypes with no array equivalent", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined)
      env.setLogLevel("debug")

      TaggedArray.fromTensor(Tensor.empty([1], "float8_e5m2"))

      expect(log).toHaveBeenNthCalledWith(
        1,
        "[IO-Bridge:encode]",
        "torch.float8_e5m2 has no array equivalent, falling back to opaque encoding",
      )
      expect(log).toHaveBeenNthCalledWith(2, "[IO-Bridge:encode]", "opaque encoding for torch.float8_e5m2 as |V1")
    })

    it("stays quiet at the default level", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined)

      TaggedArray.fromTensor(Tensor.empty([1], "bfloat16"))

      expect(log).not.toHaveBeenCalled()
    })
  })
})
