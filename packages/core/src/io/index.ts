/**
 * I/O 模块
 *
 * 目前只有 dtype bridge: 序列化容器按张量调用，
 * 容器格式、文件读写与头部持久化由调用方负责。
 */

export * from './bridge';
