import {inject, injectable} from 'tsyringe';
import {map, ok, type Result} from '../../../common/result/Result';
import type {DepositError, LoadAccountError, OpenAccountError, WithdrawError} from '../domain/exception/AccountError';
import {Account} from '../domain/model/Account';
import type {AccountId} from '../domain/model/AccountId';
import type {Money} from '../domain/model/Money';
import type {DepositMoneyCommand} from '../port/in/DepositMoneyCommand';
import type {DepositMoneyUseCase} from '../port/in/DepositMoneyUseCase';
import type {GetAccountBalanceQuery} from '../port/in/GetAccountBalanceQuery';
import type {OpenAccountCommand} from '../port/in/OpenAccountCommand';
import type {OpenAccountUseCase} from '../port/in/OpenAccountUseCase';
import type {WithdrawMoneyCommand} from '../port/in/WithdrawMoneyCommand';
import type {WithdrawMoneyUseCase} from '../port/in/WithdrawMoneyUseCase';
import {type LoadAccountPort, LoadAccountPortToken} from '../port/out/LoadAccountPort';
import {type SaveAccountPort, SaveAccountPortToken} from '../port/out/SaveAccountPort';
import {type UpdateAccountBalancePort, UpdateAccountBalancePortToken} from '../port/out/UpdateAccountBalancePort';

/**
 * アカウントアプリケーションサービス
 *
 * 役割: ユースケースの調整・オーケストレーション
 * - 受信ポート（入金・出金・残高照会・口座開設）を実装
 * - 送信ポート（ロード・保存・残高更新）を呼び出す
 * - 金額の検証と残高計算は Account に委譲する
 *
 * エラーは throw せず Result で返す。このサービスが握りつぶすことはない。
 */
@injectable()
export class AccountApplicationService
    implements DepositMoneyUseCase, WithdrawMoneyUseCase, GetAccountBalanceQuery, OpenAccountUseCase {

    constructor(
        @inject(LoadAccountPortToken)
        private readonly loadAccountPort: LoadAccountPort,
        @inject(SaveAccountPortToken)
        private readonly saveAccountPort: SaveAccountPort,
        @inject(UpdateAccountBalancePortToken)
        private readonly updateAccountBalancePort: UpdateAccountBalancePort
    ) {
    }

    /**
     * 入金（ロード → Account.deposit → 保存）
     *
     * 失敗時は保存しない。
     */
    async depositMoney(command: DepositMoneyCommand): Promise<Result<Money, DepositError>> {
        const result = await this.updateAccountBalancePort.updateBalance(
            command.accountId,
            (account) => account.deposit(command.money)
        );

        if (result.success) {
            console.log(
                `💰 Deposited ${command.money.toString()} into ${command.accountId.getValue()} ` +
                `(balance: ${result.data.getBalance().toString()})`
            );
        }

        return map(result, (account) => account.getBalance());
    }

    /**
     * 出金（ロード → Account.withdraw → 保存）
     *
     * 失敗時は保存しない。
     */
    async withdrawMoney(command: WithdrawMoneyCommand): Promise<Result<Money, WithdrawError>> {
        const result = await this.updateAccountBalancePort.updateBalance(
            command.accountId,
            (account) => account.withdraw(command.money)
        );

        if (result.success) {
            console.log(
                `💸 Withdrew ${command.money.toString()} from ${command.accountId.getValue()} ` +
                `(balance: ${result.data.getBalance().toString()})`
            );
        }

        return map(result, (account) => account.getBalance());
    }

    async getAccountBalance(accountId: AccountId): Promise<Result<Money, LoadAccountError>> {
        const result = await this.loadAccountPort.loadAccount(accountId);
        return map(result, (account) => account.getBalance());
    }

    async openAccount(command: OpenAccountCommand): Promise<Result<Account, OpenAccountError>> {
        // ① ドメインルール: 初期残高は0以上
        const opened = Account.open(command.accountId, command.initialBalance);
        if (!opened.success) {
            return opened;
        }

        // ② 永続化: 存在しない場合のみ作成
        const created = await this.saveAccountPort.createAccount(opened.data);
        if (!created.success) {
            return created;
        }

        console.log(
            `🏦 Opened account ${command.accountId.getValue()} ` +
            `(initial balance: ${command.initialBalance.toString()})`
        );
        return ok(opened.data);
    }
}
