import type {Result} from '../../../../common/result/Result';
import type {LoadAccountError} from '../../domain/exception/AccountError';
import type {AccountId} from '../../domain/model/AccountId';
import type {Money} from '../../domain/model/Money';

/**
 * 残高照会クエリ（入力ポート）
 */
export interface GetAccountBalanceQuery {
    getAccountBalance(accountId: AccountId): Promise<Result<Money, LoadAccountError>>;
}

/**
 * DI用のシンボル
 */
export const GetAccountBalanceQueryToken = Symbol('GetAccountBalanceQuery');
