import {z} from 'zod';
import {AccountId} from '../../domain/model/AccountId';
import {Money} from '../../domain/model/Money';

const WithdrawMoneyCommandSchema = z.object({
    accountId: z.custom<AccountId>((val) => val instanceof AccountId, {
        message: 'accountId must be an AccountId instance',
    }),
    money: z.custom<Money>((val) => val instanceof Money, {
        message: 'money must be a Money instance',
    }),
});

/**
 * 出金コマンド
 */
export class WithdrawMoneyCommand {
    constructor(
        public readonly accountId: AccountId,
        public readonly money: Money
    ) {
        const result = WithdrawMoneyCommandSchema.safeParse({accountId, money});

        if (!result.success) {
            throw new Error(
                `Invalid WithdrawMoneyCommand: ${result.error.issues.map((e) => e.message).join(', ')}`
            );
        }
    }
}
