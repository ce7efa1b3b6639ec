/**
 * 永続化層の障害（I/O、接続断、不正なレコードなど）
 *
 * ドメインエラーとは別の種類として扱う。
 * 元のドライバーエラーは cause に保持し、利用者向けメッセージには出さない。
 */
export class StorageFailureException extends Error {
    readonly kind = 'StorageFailure';

    /**
     * @param operation 失敗した永続化操作（例: 'loadAccount'）
     * @param cause ドライバーから返されたエラー
     */
    constructor(
        public readonly operation: string,
        cause?: unknown
    ) {
        super(`Storage operation failed: ${operation}`, {cause});
        this.name = 'StorageFailureException';
    }
}
