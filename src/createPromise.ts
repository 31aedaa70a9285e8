import type { Deferred } from "./Deferred";

export function createPromise<T = void>(): Deferred<T> {
    let resolve: (value: T | PromiseLike<T>) => void = () => {};
    let reject: (reason: unknown) => void = () => {};
    const promise = new Promise<T>((res: (value: T | PromiseLike<T>) => void, rej: (reason: unknown) => void) => {
        resolve = res;
        reject = rej;
    });
    return { resolve, reject, promise };
}
