import type {AccountId} from '../../domain/model/AccountId';

/**
 * アカウント単位で処理を直列化する出力ポート
 * 並行処理時の更新の消失（lost update）を防ぐために使用
 */
export interface AccountLock {
    /**
     * アカウントをロックした状態で task を実行
     *
     * 同じアカウントIDの task は、先に登録されたものが終わるまで開始しない。
     * task が失敗してもロックは必ず解放される。
     *
     * @param accountId ロックするアカウントのID
     * @param task ロック中に実行する処理
     */
    withAccountLock<T>(accountId: AccountId, task: () => Promise<T>): Promise<T>;
}

/**
 * DI用のシンボル
 */
export const AccountLockToken = Symbol('AccountLock');
