import type {AccountError} from '../../application/domain/exception/AccountError';

/**
 * 利用者に見せるエラーの表現
 */
export interface AccountErrorDescription {
    code: 'ACCOUNT_NOT_FOUND' | 'INVALID_AMOUNT' | 'INSUFFICIENT_FUNDS' | 'ACCOUNT_ALREADY_EXISTS' | 'STORAGE_FAILURE';
    message: string;
    details?: Record<string, string>;
}

export const STORAGE_FAILURE_MESSAGE = 'The account store is temporarily unavailable. Please try again later.';

/**
 * ドメインエラーを利用者向けの表現に変換する（Web / CLI 共通）
 *
 * StorageFailure はドライバーのメッセージを出さず、ログにだけ残す。
 */
export function describeAccountError(error: AccountError): AccountErrorDescription {
    switch (error.kind) {
        case 'AccountNotFound':
            return {
                code: 'ACCOUNT_NOT_FOUND',
                message: error.message,
                details: {accountId: error.accountId.getValue()},
            };
        case 'InvalidAmount':
            return {
                code: 'INVALID_AMOUNT',
                message: error.message,
                details: {
                    accountId: error.accountId.getValue(),
                    amount: error.amount.toString(),
                },
            };
        case 'InsufficientFunds':
            return {
                code: 'INSUFFICIENT_FUNDS',
                message: error.message,
                details: {
                    accountId: error.accountId.getValue(),
                    attemptedAmount: error.attemptedAmount.toString(),
                    currentBalance: error.currentBalance.toString(),
                },
            };
        case 'AccountAlreadyExists':
            return {
                code: 'ACCOUNT_ALREADY_EXISTS',
                message: error.message,
                details: {accountId: error.accountId.getValue()},
            };
        case 'StorageFailure':
            console.error(`❌ ${error.message}:`, error.cause);
            return {
                code: 'STORAGE_FAILURE',
                message: STORAGE_FAILURE_MESSAGE,
            };
    }
}
