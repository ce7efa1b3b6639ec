import {Command, InvalidArgumentError} from 'commander';
import {container} from 'tsyringe';
import type {AccountError} from '../../../application/domain/exception/AccountError';
import {AccountId} from '../../../application/domain/model/AccountId';
import {Money} from '../../../application/domain/model/Money';
import {DepositMoneyCommand} from '../../../application/port/in/DepositMoneyCommand';
import type {DepositMoneyUseCase} from '../../../application/port/in/DepositMoneyUseCase';
import {DepositMoneyUseCaseToken} from '../../../application/port/in/DepositMoneyUseCase';
import type {GetAccountBalanceQuery} from '../../../application/port/in/GetAccountBalanceQuery';
import {GetAccountBalanceQueryToken} from '../../../application/port/in/GetAccountBalanceQuery';
import {OpenAccountCommand} from '../../../application/port/in/OpenAccountCommand';
import type {OpenAccountUseCase} from '../../../application/port/in/OpenAccountUseCase';
import {OpenAccountUseCaseToken} from '../../../application/port/in/OpenAccountUseCase';
import {WithdrawMoneyCommand} from '../../../application/port/in/WithdrawMoneyCommand';
import type {WithdrawMoneyUseCase} from '../../../application/port/in/WithdrawMoneyUseCase';
import {WithdrawMoneyUseCaseToken} from '../../../application/port/in/WithdrawMoneyUseCase';
import {describeAccountError} from '../AccountErrorPresenter';

/**
 * CLIの出力先
 */
export interface CliOutput {
    info(message: string): void;
    /**
     * 失敗を報告する（終了コードは 1 になる）
     */
    fail(message: string): void;
}

export const consoleOutput: CliOutput = {
    info: (message) => {
        console.log(message);
    },
    fail: (message) => {
        console.error(`Error: ${message}`);
        process.exitCode = 1;
    },
};

/**
 * 金額の引数を数値に変換する
 *
 * 読めない値は commander のエラーとして報告される。
 */
export function parseAmount(value: string): number {
    const amount = Number(value);

    if (value.trim() === '' || !Number.isFinite(amount)) {
        throw new InvalidArgumentError('Amount must be a number.');
    }

    return amount;
}

/**
 * bank コマンドを作成する
 *
 * exitOverride 済み。引数エラーや --help は process.exit せず CommanderError として投げる。
 *
 * Usage:
 *   bank open <accountId> [initialBalance]
 *   bank deposit <accountId> <amount>
 *   bank withdraw <accountId> <amount>
 *   bank balance <accountId>
 */
export function createAccountCli(output: CliOutput = consoleOutput): Command {
    const reportError = (error: AccountError): void => {
        output.fail(describeAccountError(error).message);
    };

    const program = new Command('bank')
        .description('Manage account balances')
        .exitOverride();

    program
        .command('open')
        .description('Open a new account')
        .argument('<accountId>', 'Account ID')
        .argument('[initialBalance]', 'Initial balance (default: 0)', parseAmount)
        .action(async (accountId: string, initialBalance: number | undefined) => {
            const useCase = container.resolve<OpenAccountUseCase>(OpenAccountUseCaseToken);
            const result = await useCase.openAccount(
                new OpenAccountCommand(new AccountId(accountId), Money.of(initialBalance ?? 0))
            );

            if (!result.success) {
                reportError(result.error);
                return;
            }

            output.info(`Opened account ${accountId} with balance ${result.data.getBalance().toString()}`);
        });

    program
        .command('deposit')
        .description('Deposit money into an account')
        .argument('<accountId>', 'Account ID')
        .argument('<amount>', 'Amount to deposit', parseAmount)
        .action(async (accountId: string, amount: number) => {
            const useCase = container.resolve<DepositMoneyUseCase>(DepositMoneyUseCaseToken);
            const result = await useCase.depositMoney(
                new DepositMoneyCommand(new AccountId(accountId), Money.of(amount))
            );

            if (!result.success) {
                reportError(result.error);
                return;
            }

            output.info(`Balance of ${accountId}: ${result.data.toString()}`);
        });

    program
        .command('withdraw')
        .description('Withdraw money from an account')
        .argument('<accountId>', 'Account ID')
        .argument('<amount>', 'Amount to withdraw', parseAmount)
        .action(async (accountId: string, amount: number) => {
            const useCase = container.resolve<WithdrawMoneyUseCase>(WithdrawMoneyUseCaseToken);
            const result = await useCase.withdrawMoney(
                new WithdrawMoneyCommand(new AccountId(accountId), Money.of(amount))
            );

            if (!result.success) {
                reportError(result.error);
                return;
            }

            output.info(`Balance of ${accountId}: ${result.data.toString()}`);
        });

    program
        .command('balance')
        .description('Show the balance of an account')
        .argument('<accountId>', 'Account ID')
        .action(async (accountId: string) => {
            const query = container.resolve<GetAccountBalanceQuery>(GetAccountBalanceQueryToken);
            const result = await query.getAccountBalance(new AccountId(accountId));

            if (!result.success) {
                reportError(result.error);
                return;
            }

            output.info(`Balance of ${accountId}: ${result.data.toString()}`);
        });

    return program;
}
