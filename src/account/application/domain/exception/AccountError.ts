import type {AccountAlreadyExistsException} from './AccountAlreadyExistsException';
import type {AccountNotFoundException} from './AccountNotFoundException';
import type {InsufficientFundsException} from './InsufficientFundsException';
import type {InvalidAmountException} from './InvalidAmountException';
import type {StorageFailureException} from './StorageFailureException';

/**
 * アカウント操作で返されうるエラーの全種類
 *
 * kind で判別できる。
 */
export type AccountError =
    | AccountNotFoundException
    | InvalidAmountException
    | InsufficientFundsException
    | AccountAlreadyExistsException
    | StorageFailureException;

/**
 * 入出金・口座開設で発生するエラー
 */
export type DepositError = AccountNotFoundException | InvalidAmountException | StorageFailureException;

export type WithdrawError =
    | AccountNotFoundException
    | InvalidAmountException
    | InsufficientFundsException
    | StorageFailureException;

export type LoadAccountError = AccountNotFoundException | StorageFailureException;

export type OpenAccountError = InvalidAmountException | AccountAlreadyExistsException | StorageFailureException;
