import type {Result} from '../../../../common/result/Result';
import type {AccountAlreadyExistsException} from '../../domain/exception/AccountAlreadyExistsException';
import type {StorageFailureException} from '../../domain/exception/StorageFailureException';
import type {Account} from '../../domain/model/Account';

/**
 * アカウントを保存するための出力ポート
 */
export interface SaveAccountPort {
    /**
     * アカウントの残高を保存（upsert）
     *
     * レコードがなければ作成、あれば上書きする。存在確認と書き込みを分けず、1回のアトミックな操作で行う。
     * 同じ状態を2回保存しても結果は1回保存した場合と同じ。
     */
    saveAccount(account: Account): Promise<Result<void, StorageFailureException>>;

    /**
     * アカウントを新規作成（存在しない場合のみ）
     *
     * @returns 既に存在する場合は AccountAlreadyExists（既存レコードは変更しない）
     */
    createAccount(account: Account): Promise<Result<void, AccountAlreadyExistsException | StorageFailureException>>;
}

/**
 * DI用のシンボル
 */
export const SaveAccountPortToken = Symbol('SaveAccountPort');
