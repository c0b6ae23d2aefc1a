import { DeviceNameEnum } from "@tensorweave/types"
import { LogLevel } from "@tensorweave/utils"
import { env } from "../env"
import { Tensor } from "../tensor"

describe("env", () => {
  afterEach(() => {
    env.setDefaultDevice(DeviceNameEnum.JS)
    env.setLogLevel(LogLevel.WARN)
  })

  it("supplies the default device for new tensors", () => {
    env.setDefaultDevice(DeviceNameEnum.Node)

    expect(env.getDefaultDevice()).toBe(DeviceNameEnum.Node)
    expect(Tensor.empty([1], "float32").device).toBe(DeviceNameEnum.Node)
  })

  it("sets the log level by value or name", () => {
    env.setLogLevel("debug")
    expect(env.getLogLevel()).toBe(LogLevel.DEBUG)

    env.setLogLevel(LogLevel.ERROR)
    expect(env.getLogLevel()).toBe(LogLevel.ERROR)
  })
})
