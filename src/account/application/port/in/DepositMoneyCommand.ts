import {z} from 'zod';
import {AccountId} from '../../domain/model/AccountId';
import {Money} from '../../domain/model/Money';

/**
 * 入金コマンドのバリデーションスキーマ
 *
 * 金額の正負はドメインルール（Account.deposit）で判定するため、ここでは型だけを見る。
 */
const DepositMoneyCommandSchema = z.object({
    accountId: z.custom<AccountId>((val) => val instanceof AccountId, {
        message: 'accountId must be an AccountId instance',
    }),
    money: z.custom<Money>((val) => val instanceof Money, {
        message: 'money must be a Money instance',
    }),
});

/**
 * 入金コマンド
 * 不変オブジェクトとして実装
 */
export class DepositMoneyCommand {
    constructor(
        public readonly accountId: AccountId,
        public readonly money: Money
    ) {
        const result = DepositMoneyCommandSchema.safeParse({accountId, money});

        if (!result.success) {
            throw new Error(
                `Invalid DepositMoneyCommand: ${result.error.issues.map((e) => e.message).join(', ')}`
            );
        }
    }
}
