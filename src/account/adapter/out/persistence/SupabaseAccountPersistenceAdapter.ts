import {inject, injectable} from 'tsyringe';
import {z} from 'zod';
import {err, ok, type Result} from '../../../../common/result/Result';
import {AccountAlreadyExistsException} from '../../../application/domain/exception/AccountAlreadyExistsException';
import type {LoadAccountError} from '../../../application/domain/exception/AccountError';
import {AccountNotFoundException} from '../../../application/domain/exception/AccountNotFoundException';
import {StorageFailureException} from '../../../application/domain/exception/StorageFailureException';
import type {Account} from '../../../application/domain/model/Account';
import type {AccountId} from '../../../application/domain/model/AccountId';
import type {AccountStorePort} from '../../../application/port/out/AccountStorePort';
import type {AccountMutation} from '../../../application/port/out/UpdateAccountBalancePort';
import {DatabaseConfigToken, SupabaseClientToken} from '../../../../config/types';
import type {DatabaseConfig, TypedSupabaseClient} from '../../../../config/types';
import {UpdatedAccountRecordSchema} from './entities/AccountRecord';
import {parseAccountRecords, toDomain, toRecord} from './mappers/AccountMapper';

const ACCOUNTS_TABLE = 'accounts';

/**
 * テーブルを冪等に作成するデータベース関数（supabase/migrations を参照）
 */
const ENSURE_TABLE_FUNCTION = 'ensure_accounts_table';

/**
 * PostgreSQL の一意制約違反
 */
const UNIQUE_VIOLATION = '23505';

/**
 * Supabaseを使用したアカウント永続化アダプター
 *
 * 永続化層の責務：
 * 1. DBからデータを取得
 * 2. DBレコードをドメインモデルに変換（Mapper使用）
 * 3. ドメインモデルからDBレコードに変換（Mapper使用）
 * 4. DBにデータを保存
 *
 * 残高の更新は楽観的排他（読んだ残高を条件にした UPDATE）で行い、
 * 他の書き込みと競合したら読み直して再試行する。
 */
@injectable()
export class SupabaseAccountPersistenceAdapter implements AccountStorePort {

    constructor(
        @inject(SupabaseClientToken) private readonly supabase: TypedSupabaseClient,
        @inject(DatabaseConfigToken) private readonly config: DatabaseConfig
    ) {
        console.log('✅ SupabaseAccountPersistenceAdapter initialized');
    }

    async initialize(): Promise<Result<void, StorageFailureException>> {
        const {error} = await this.supabase.rpc(ENSURE_TABLE_FUNCTION);

        if (error) {
            return err(this.storageFailure('initialize', error));
        }

        console.log(`✅ Table "${ACCOUNTS_TABLE}" is ready`);
        return ok(undefined);
    }

    /**
     * アカウントを読み込む
     *
     * 処理の流れ：
     * 1. DBからIDが一致する行を取得
     * 2. スキーマで検証
     * 3. Mapperでドメインモデルに変換
     */
    async loadAccount(accountId: AccountId): Promise<Result<Account, LoadAccountError>> {
        const {data, error} = await this.supabase
            .from(ACCOUNTS_TABLE)
            .select('id, balance')
            .eq('id', accountId.getValue());

        if (error) {
            return err(this.storageFailure('loadAccount', error));
        }

        const records = parseAccountRecords(data, 'loadAccount');
        if (!records.success) {
            console.error(`❌ Unexpected row for account ${accountId.getValue()}:`, records.error.cause);
            return records;
        }

        const [record] = records.data;
        if (record === undefined) {
            return err(new AccountNotFoundException(accountId));
        }

        return ok(toDomain(record));
    }

    /**
     * 残高を保存（id が衝突したら上書き）
     */
    async saveAccount(account: Account): Promise<Result<void, StorageFailureException>> {
        const {error} = await this.supabase
            .from(ACCOUNTS_TABLE)
            .upsert(toRecord(account), {onConflict: 'id'});

        if (error) {
            return err(this.storageFailure('saveAccount', error));
        }

        return ok(undefined);
    }

    async createAccount(
        account: Account
    ): Promise<Result<void, AccountAlreadyExistsException | StorageFailureException>> {
        const {error} = await this.supabase
            .from(ACCOUNTS_TABLE)
            .insert(toRecord(account));

        if (error) {
            if (error.code === UNIQUE_VIOLATION) {
                return err(new AccountAlreadyExistsException(account.getId()));
            }
            return err(this.storageFailure('createAccount', error));
        }

        return ok(undefined);
    }

    /**
     * 残高をアトミックに更新
     *
     * 処理の流れ（最大 maxUpdateAttempts 回）：
     * 1. ロードして、読んだ残高を覚えておく
     * 2. mutate を適用（失敗したら何も書かずに返す）
     * 3. 「残高が読んだときのままなら」という条件付きで UPDATE
     * 4. 1行も更新されなければ、他の書き込みが先に入ったので 1 からやり直す
     */
    async updateBalance<E>(
        accountId: AccountId,
        mutate: AccountMutation<E>
    ): Promise<Result<Account, E | LoadAccountError>> {
        for (let attempt = 1; attempt <= this.config.maxUpdateAttempts; attempt++) {
            const loaded = await this.loadAccount(accountId);
            if (!loaded.success) {
                return loaded;
            }

            const account = loaded.data;
            const expectedBalance = account.getBalance().getAmount();

            const mutated = mutate(account);
            if (!mutated.success) {
                return mutated;
            }

            const {data, error} = await this.supabase
                .from(ACCOUNTS_TABLE)
                .update({balance: account.getBalance().getAmount()})
                .eq('id', accountId.getValue())
                .eq('balance', expectedBalance)
                .select('id');

            if (error) {
                return err(this.storageFailure('updateBalance', error));
            }

            const updated = z.array(UpdatedAccountRecordSchema).safeParse(data);
            if (!updated.success) {
                return err(new StorageFailureException('updateBalance', updated.error));
            }

            if (updated.data.length > 0) {
                return ok(account);
            }

            console.warn(
                `⚠️ Balance of account ${accountId.getValue()} changed concurrently ` +
                `(attempt ${attempt.toString()}/${this.config.maxUpdateAttempts.toString()})`
            );
        }

        return err(
            new StorageFailureException(
                'updateBalance',
                new Error(
                    `Gave up updating account ${accountId.getValue()} after ` +
                    `${this.config.maxUpdateAttempts.toString()} conflicting attempts`
                )
            )
        );
    }

    async close(): Promise<void> {
        await this.supabase.removeAllChannels();
        console.log('✅ SupabaseAccountPersistenceAdapter closed');
    }

    /**
     * ドライバーのエラーをログに残し、StorageFailure に包む
     */
    private storageFailure(operation: string, cause: {message: string; code: string}): StorageFailureException {
        console.error(`❌ Supabase ${operation} failed [${cause.code}]: ${cause.message}`);
        return new StorageFailureException(operation, cause);
    }
}
