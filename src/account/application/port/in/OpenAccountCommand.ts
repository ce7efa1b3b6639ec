import {z} from 'zod';
import {AccountId} from '../../domain/model/AccountId';
import {Money} from '../../domain/model/Money';

const OpenAccountCommandSchema = z.object({
    accountId: z.custom<AccountId>((val) => val instanceof AccountId, {
        message: 'accountId must be an AccountId instance',
    }),
    initialBalance: z.custom<Money>((val) => val instanceof Money, {
        message: 'initialBalance must be a Money instance',
    }),
});

/**
 * 口座開設コマンド
 */
export class OpenAccountCommand {
    constructor(
        public readonly accountId: AccountId,
        public readonly initialBalance: Money = Money.ZERO
    ) {
        const result = OpenAccountCommandSchema.safeParse({accountId, initialBalance});

        if (!result.success) {
            throw new Error(
                `Invalid OpenAccountCommand: ${result.error.issues.map((e) => e.message).join(', ')}`
            );
        }
    }
}
