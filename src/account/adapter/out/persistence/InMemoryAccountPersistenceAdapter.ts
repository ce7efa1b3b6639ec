import {inject, injectable} from 'tsyringe';
import {err, ok, type Result} from '../../../../common/result/Result';
import {AccountAlreadyExistsException} from '../../../application/domain/exception/AccountAlreadyExistsException';
import type {LoadAccountError} from '../../../application/domain/exception/AccountError';
import {AccountNotFoundException} from '../../../application/domain/exception/AccountNotFoundException';
import type {StorageFailureException} from '../../../application/domain/exception/StorageFailureException';
import {Account} from '../../../application/domain/model/Account';
import type {AccountId} from '../../../application/domain/model/AccountId';
import {Money} from '../../../application/domain/model/Money';
import {type AccountLock, AccountLockToken} from '../../../application/port/out/AccountLock';
import type {AccountStorePort} from '../../../application/port/out/AccountStorePort';
import type {AccountMutation} from '../../../application/port/out/UpdateAccountBalancePort';

/**
 * インメモリアカウント永続化アダプター
 * 開発・テスト用の簡易実装（プロセス再起動でデータは消える）
 *
 * 残高の更新は AccountLock でアカウントごとに直列化する。
 */
@injectable()
export class InMemoryAccountPersistenceAdapter implements AccountStorePort {
    /**
     * キー: アカウントID
     * 値: 残高
     */
    private readonly balances = new Map<string, number>();

    constructor(
        @inject(AccountLockToken) private readonly accountLock: AccountLock
    ) {
    }

    initialize(): Promise<Result<void, StorageFailureException>> {
        console.log('💾 [InMemory] Account store ready');
        return Promise.resolve(ok(undefined));
    }

    loadAccount(accountId: AccountId): Promise<Result<Account, LoadAccountError>> {
        const balance = this.balances.get(accountId.getValue());

        if (balance === undefined) {
            return Promise.resolve(err(new AccountNotFoundException(accountId)));
        }

        // 毎回新しいインスタンスを返す（ストアから切り離されたスナップショット）
        return Promise.resolve(ok(Account.withBalance(accountId, Money.of(balance))));
    }

    saveAccount(account: Account): Promise<Result<void, StorageFailureException>> {
        this.balances.set(account.getId().getValue(), account.getBalance().getAmount());
        return Promise.resolve(ok(undefined));
    }

    createAccount(
        account: Account
    ): Promise<Result<void, AccountAlreadyExistsException | StorageFailureException>> {
        const key = account.getId().getValue();

        if (this.balances.has(key)) {
            return Promise.resolve(err(new AccountAlreadyExistsException(account.getId())));
        }

        this.balances.set(key, account.getBalance().getAmount());
        return Promise.resolve(ok(undefined));
    }

    updateBalance<E>(
        accountId: AccountId,
        mutate: AccountMutation<E>
    ): Promise<Result<Account, E | LoadAccountError>> {
        return this.accountLock.withAccountLock(
            accountId,
            async (): Promise<Result<Account, E | LoadAccountError>> => {
                // ① ロード
                const loaded = await this.loadAccount(accountId);
                if (!loaded.success) {
                    return loaded;
                }

                // ② 変更（失敗したら保存しない）
                const account = loaded.data;
                const mutated = mutate(account);
                if (!mutated.success) {
                    return mutated;
                }

                // ③ 保存
                const saved = await this.saveAccount(account);
                if (!saved.success) {
                    return saved;
                }

                return ok(account);
            }
        );
    }

    close(): Promise<void> {
        console.log('💾 [InMemory] Account store closed');
        return Promise.resolve();
    }
}
