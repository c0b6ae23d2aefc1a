/**
 * 进程内自增 ID，供 Tensor / Storage 标识使用
 */
let tensorIdCounter = 0;
let storageIdCounter = 0;

export function nextTensorId(): number {
    return tensorIdCounter++;
}

export function nextStorageId(): number {
    return storageIdCounter++;
}
