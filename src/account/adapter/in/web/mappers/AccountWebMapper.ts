import type { ZodError } from 'zod';
import type { AccountErrorDescription } from '../../AccountErrorPresenter';
import { AccountId } from '../../../../application/domain/model/AccountId';
import { Money } from '../../../../application/domain/model/Money';
import { DepositMoneyCommand } from '../../../../application/port/in/DepositMoneyCommand';
import { OpenAccountCommand } from '../../../../application/port/in/OpenAccountCommand';
import { WithdrawMoneyCommand } from '../../../../application/port/in/WithdrawMoneyCommand';
import type { MoneyWebRequest, OpenAccountWebRequest } from '../models/AccountWebRequest';
import type { AccountWebResponse } from '../models/AccountWebResponse';

/**
 * Web層とアプリケーション層の間でモデルを変換するマッパー
 *
 * 責務：
 * - Webリクエストをドメインコマンドに変換
 * - ビジネスロジックの結果をWebレスポンスに変換
 */

export function toDepositCommand(accountId: string, request: MoneyWebRequest): DepositMoneyCommand {
    return new DepositMoneyCommand(new AccountId(accountId), Money.of(request.amount));
}

export function toWithdrawCommand(accountId: string, request: MoneyWebRequest): WithdrawMoneyCommand {
    return new WithdrawMoneyCommand(new AccountId(accountId), Money.of(request.amount));
}

export function toOpenAccountCommand(request: OpenAccountWebRequest): OpenAccountCommand {
    return new OpenAccountCommand(
        new AccountId(request.accountId),
        Money.of(request.initialBalance ?? 0)
    );
}

/**
 * 成功レスポンスを作成
 */
export function toSuccessResponse(
    message: string,
    accountId: AccountId,
    balance: Money
): AccountWebResponse {
    return {
        success: true,
        message,
        data: {
            accountId: accountId.getValue(),
            balance: balance.getAmount(),
        },
    };
}

/**
 * エラーレスポンスを作成
 */
export function toErrorResponse(
    message: string,
    code: string,
    details?: Record<string, unknown>
): AccountWebResponse {
    return {
        success: false,
        message,
        error: {
            code,
            details,
        },
    };
}

/**
 * ドメインエラーの表現からエラーレスポンスを作成
 */
export function toAccountErrorResponse(description: AccountErrorDescription): AccountWebResponse {
    return toErrorResponse(description.message, description.code, description.details);
}

/**
 * リクエストの形式エラーからエラーレスポンスを作成
 */
export function toValidationErrorResponse(error: ZodError): AccountWebResponse {
    return toErrorResponse('Invalid request', 'VALIDATION_ERROR', {
        issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        })),
    });
}

/**
 * エラーコード → HTTPステータス
 */
export function toHttpStatus(code: AccountErrorDescription['code']): 400 | 404 | 409 | 503 {
    switch (code) {
        case 'ACCOUNT_NOT_FOUND':
            return 404;
        case 'INVALID_AMOUNT':
        case 'INSUFFICIENT_FUNDS':
            return 400;
        case 'ACCOUNT_ALREADY_EXISTS':
            return 409;
        case 'STORAGE_FAILURE':
            return 503;
    }
}
