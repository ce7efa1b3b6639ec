import type {Result} from '../../../../common/result/Result';
import type {LoadAccountError} from '../../domain/exception/AccountError';
import type {Account} from '../../domain/model/Account';
import type {AccountId} from '../../domain/model/AccountId';

// 依存関係の向き(永続化層がアプリケーション層に依存する)
// 永続化層（adapter/out/persistence）
//     ↓ 依存(実装)
// アプリケーション層のポート（application/port/out）(ここ)
//     ↑ 依存
// アプリケーション層のサービス（application/service）
//     ↓ 依存
// ドメイン層のエンティティ（application/domain/model）

/**
 * アカウントをロードするための出力ポート
 * 永続化アダプターが実装する
 */
export interface LoadAccountPort {
    /**
     * アカウントIDを指定してアカウントをロード
     *
     * 返されるAccountはストアから切り離されたスナップショット。
     * 変更しても saveAccount() するまでストアには反映されない。
     *
     * @returns 存在しない場合は AccountNotFound
     */
    loadAccount(accountId: AccountId): Promise<Result<Account, LoadAccountError>>;
}

/**
 * DI用のシンボル
 */
export const LoadAccountPortToken = Symbol('LoadAccountPort');
