import {err, ok, type Result} from '../../../../common/result/Result';
import {InsufficientFundsException} from '../exception/InsufficientFundsException';
import {InvalidAmountException} from '../exception/InvalidAmountException';
import type {AccountId} from './AccountId';
import {Money} from './Money';

/**
 * 銀行口座エンティティ
 *
 * 不変条件:
 * - 残高は常に0以上
 * - 入金額は0より大きい
 * - 出金額は0以上で、残高を超えない（0の出金は何もしない）
 *
 * 入出金は「全部検証してから適用」する。失敗時は残高を一切変更しない。
 */
export class Account {
    private constructor(
        private readonly id: AccountId,
        private balance: Money
    ) {
    }

    /**
     * 新規口座を開設する
     *
     * @param id アカウントID
     * @param initialBalance 初期残高（省略時は0）
     */
    static open(
        id: AccountId,
        initialBalance: Money = Money.ZERO
    ): Result<Account, InvalidAmountException> {
        if (initialBalance.isNegative()) {
            return err(new InvalidAmountException(id, initialBalance, 'initial balance must not be negative'));
        }
        return ok(new Account(id, initialBalance));
    }

    /**
     * 保存済みの状態からAccountを再構成する
     *
     * 永続化アダプターのマッパーから使う。負の残高はここに来る前に弾かれている前提。
     */
    static withBalance(id: AccountId, balance: Money): Account {
        if (balance.isNegative()) {
            throw new Error(`Account balance must not be negative: ${balance.toString()}`);
        }
        return new Account(id, balance);
    }

    getId(): AccountId {
        return this.id;
    }

    getBalance(): Money {
        return this.balance;
    }

    /**
     * 入金
     *
     * @returns 入金後の残高
     */
    deposit(money: Money): Result<Money, InvalidAmountException> {
        if (!money.isPositive()) {
            return err(new InvalidAmountException(this.id, money, 'deposit amount must be greater than 0'));
        }
        if (!Number.isFinite(this.balance.getAmount() + money.getAmount())) {
            return err(new InvalidAmountException(this.id, money, 'resulting balance is too large'));
        }

        this.balance = this.balance.plus(money);
        return ok(this.balance);
    }

    /**
     * 出金
     *
     * @returns 出金後の残高
     */
    withdraw(money: Money): Result<Money, InvalidAmountException | InsufficientFundsException> {
        if (money.isNegative()) {
            return err(new InvalidAmountException(this.id, money, 'withdrawal amount must not be negative'));
        }

        if (!this.mayWithdraw(money)) {
            return err(new InsufficientFundsException(this.id, money, this.balance));
        }

        this.balance = this.balance.minus(money);
        return ok(this.balance);
    }

    private mayWithdraw(money: Money): boolean {
        return !money.isGreaterThan(this.balance);
    }
}
