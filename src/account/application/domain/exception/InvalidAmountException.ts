import type {AccountId} from '../model/AccountId';
import type {Money} from '../model/Money';

/**
 * 金額不正エラー
 *
 * 【発生条件】
 * - 入金額が0以下
 * - 入金後の残高が数値として表せない
 * - 出金額が負
 * - 口座開設時の初期残高が負
 */
export class InvalidAmountException extends Error {
    readonly kind = 'InvalidAmount';

    constructor(
        public readonly accountId: AccountId,
        public readonly amount: Money,
        reason: string
    ) {
        super(`Invalid amount ${amount.toString()} for account ${accountId.getValue()}: ${reason}`);
        this.name = 'InvalidAmountException';
    }
}
