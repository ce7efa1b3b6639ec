import {z} from 'zod';
import {err, ok, type Result} from '../../../../../common/result/Result';
import {StorageFailureException} from '../../../../application/domain/exception/StorageFailureException';
import {Account} from '../../../../application/domain/model/Account';
import {AccountId} from '../../../../application/domain/model/AccountId';
import {Money} from '../../../../application/domain/model/Money';
import {type AccountRecord, type PersistedAccountRecord, PersistedAccountRecordSchema} from '../entities/AccountRecord';

/**
 * 永続化層とドメイン層の間でモデルを変換するマッパー
 *
 * // データベースから取得したデータ
 * { id: "12345", balance: 150 }
 *
 * // ↓ toDomain() で変換 ↓
 *
 * Account { id: AccountId("12345"), balance: Money(150) }
 */

/**
 * 取得結果（unknown）を検証してレコード配列にする
 *
 * スキーマに合わない行（負の残高など）は StorageFailure として扱う。
 */
export function parseAccountRecords(
    data: unknown,
    operation: string
): Result<PersistedAccountRecord[], StorageFailureException> {
    const parsed = z.array(PersistedAccountRecordSchema).safeParse(data);

    if (!parsed.success) {
        return err(new StorageFailureException(operation, parsed.error));
    }

    return ok(parsed.data);
}

/**
 * DBレコードをドメインモデルに変換
 */
export function toDomain(record: PersistedAccountRecord): Account {
    return Account.withBalance(new AccountId(record.id), Money.of(record.balance));
}

/**
 * ドメインモデルからDBレコードへの変換
 */
export function toRecord(account: Account): AccountRecord {
    return {
        id: account.getId().getValue(),
        balance: account.getBalance().getAmount(),
    };
}
