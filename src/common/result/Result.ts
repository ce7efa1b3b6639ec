/**
 * 処理結果を表す判別共用体
 *
 * zod の safeParse と同じ形（success / data / error）にそろえている。
 * ドメイン層・アプリケーション層は業務エラーを throw せず、この型で返す。
 */
export type Result<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
    readonly success: true;
    readonly data: T;
}

export interface Failure<E> {
    readonly success: false;
    readonly error: E;
}

export function ok<T>(data: T): Success<T> {
    return {success: true, data};
}

export function err<E>(error: E): Failure<E> {
    return {success: false, error};
}

/**
 * 成功値だけを変換する（失敗はそのまま通す）
 */
export function map<T, U, E>(result: Result<T, E>, fn: (data: T) => U): Result<U, E> {
    return result.success ? ok(fn(result.data)) : result;
}
