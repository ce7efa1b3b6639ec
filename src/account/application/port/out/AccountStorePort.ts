import type {Result} from '../../../../common/result/Result';
import type {StorageFailureException} from '../../domain/exception/StorageFailureException';
import type {LoadAccountPort} from './LoadAccountPort';
import type {SaveAccountPort} from './SaveAccountPort';
import type {UpdateAccountBalancePort} from './UpdateAccountBalancePort';

/**
 * アカウントストア全体の出力ポート
 *
 * 各ポートに加えて、ストアのライフサイクル（初期化・クローズ）を持つ。
 * アプリケーションサービスは個別のポートにだけ依存し、ライフサイクルは構成ルート（config）が扱う。
 */
export interface AccountStorePort extends LoadAccountPort, SaveAccountPort, UpdateAccountBalancePort {
    /**
     * テーブル（または構造）を用意する
     *
     * 冪等。何度呼んでも「構造が存在する」状態になるだけ。
     */
    initialize(): Promise<Result<void, StorageFailureException>>;

    /**
     * 接続などのリソースを解放する
     */
    close(): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const AccountStorePortToken = Symbol('AccountStorePort');
