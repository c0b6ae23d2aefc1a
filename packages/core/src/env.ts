import { DeviceNameEnum } from "@tensorweave/types";
import { getGlobalLogLevel, LogLevel, parseLogLevel, setGlobalLogLevel } from "@tensorweave/utils";

class Environment {

    private _defaultDevice: DeviceNameEnum = DeviceNameEnum.JS;

    setDefaultDevice(device: DeviceNameEnum) {
        this._defaultDevice = device;
    }

    getDefaultDevice(): DeviceNameEnum {
        return this._defaultDevice;
    }

    /**
     * 设置全局日志级别，接受 LogLevel 或 'debug' / 'warn' 等名字
     */
    setLogLevel(level: LogLevel | string) {
        setGlobalLogLevel(typeof level === 'string' ? parseLogLevel(level) : level);
    }

    getLogLevel(): LogLevel {
        return getGlobalLogLevel();
    }
}

export const env = new Environment();
