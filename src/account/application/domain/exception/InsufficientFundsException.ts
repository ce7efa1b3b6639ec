// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// InsufficientFundsException（残高不足）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 出金額が現在残高を超えている場合のエラー。
// throw はせず、Account.withdraw() の Result として返される。
//
// 【使い方の例】
// const result = account.withdraw(Money.of(200));
// if (!result.success && result.error.kind === 'InsufficientFunds') {
//     console.log(`試行金額: ${result.error.attemptedAmount.toString()}`);
//     console.log(`現在残高: ${result.error.currentBalance.toString()}`);
// }
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

import type {AccountId} from '../model/AccountId';
import type {Money} from '../model/Money';

export class InsufficientFundsException extends Error {
    readonly kind = 'InsufficientFunds';

    /**
     * @param accountId 残高不足が発生したアカウントID
     * @param attemptedAmount 引き出そうとした金額
     * @param currentBalance 出金前の残高
     */
    constructor(
        public readonly accountId: AccountId,
        public readonly attemptedAmount: Money,
        public readonly currentBalance: Money
    ) {
        super(
            `Insufficient funds in account ${accountId.getValue()}: ` +
            `attempted to withdraw ${attemptedAmount.toString()}, ` +
            `but current balance is ${currentBalance.toString()}`
        );
        this.name = 'InsufficientFundsException';
    }
}
