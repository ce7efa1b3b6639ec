import type {Result} from '../../../../common/result/Result';
import type {LoadAccountError} from '../../domain/exception/AccountError';
import type {Account} from '../../domain/model/Account';
import type {AccountId} from '../../domain/model/AccountId';

/**
 * 残高を変更する関数
 *
 * 失敗を返した場合、ストアへの保存は行われない。
 */
export type AccountMutation<E> = (account: Account) => Result<unknown, E>;

/**
 * 残高をアトミックに更新するための出力ポート
 *
 * ロード → 変更 → 保存 を、アカウントIDごとに直列化された1つの単位として実行する。
 * 同じ残高から同時に2件の入金が走っても、片方の更新が失われることはない。
 */
export interface UpdateAccountBalancePort {
    /**
     * @param accountId 更新するアカウントのID
     * @param mutate ロードしたAccountに適用する変更
     * @returns 成功時は保存後のAccount
     */
    updateBalance<E>(
        accountId: AccountId,
        mutate: AccountMutation<E>
    ): Promise<Result<Account, E | LoadAccountError>>;
}

/**
 * DI用のシンボル
 */
export const UpdateAccountBalancePortToken = Symbol('UpdateAccountBalancePort');
