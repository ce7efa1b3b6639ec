import {zValidator} from '@hono/zod-validator';
import {type Context, Hono} from 'hono';
import {container} from 'tsyringe';
import type {ZodError} from 'zod';
import type {AccountError} from '../../../application/domain/exception/AccountError';
import {AccountId} from '../../../application/domain/model/AccountId';
import type {DepositMoneyUseCase} from '../../../application/port/in/DepositMoneyUseCase';
import {DepositMoneyUseCaseToken} from '../../../application/port/in/DepositMoneyUseCase';
import type {GetAccountBalanceQuery} from '../../../application/port/in/GetAccountBalanceQuery';
import {GetAccountBalanceQueryToken} from '../../../application/port/in/GetAccountBalanceQuery';
import type {OpenAccountUseCase} from '../../../application/port/in/OpenAccountUseCase';
import {OpenAccountUseCaseToken} from '../../../application/port/in/OpenAccountUseCase';
import type {WithdrawMoneyUseCase} from '../../../application/port/in/WithdrawMoneyUseCase';
import {WithdrawMoneyUseCaseToken} from '../../../application/port/in/WithdrawMoneyUseCase';
import {describeAccountError} from '../AccountErrorPresenter';
import {
    toAccountErrorResponse,
    toDepositCommand,
    toHttpStatus,
    toOpenAccountCommand,
    toSuccessResponse,
    toValidationErrorResponse,
    toWithdrawCommand,
} from './mappers/AccountWebMapper';
import {AccountParamSchema, MoneyWebRequestSchema, OpenAccountWebRequestSchema} from './models/AccountWebRequest';

export const accountRouter = new Hono();

/**
 * zValidator のフック: 形式エラーは VALIDATION_ERROR (400) で返す
 */
function rejectInvalidRequest(
    result: {success: true} | {success: false; error: ZodError},
    c: Context
): Response | undefined {
    if (!result.success) {
        return c.json(toValidationErrorResponse(result.error), 400);
    }
    return undefined;
}

/**
 * ドメインエラーをレスポンスに変換
 */
function respondWithAccountError(c: Context, error: AccountError): Response {
    const description = describeAccountError(error);
    return c.json(toAccountErrorResponse(description), toHttpStatus(description.code));
}

/**
 * POST /api/accounts
 * 口座を開設する
 */
accountRouter.post(
    '/accounts',
    zValidator('json', OpenAccountWebRequestSchema, rejectInvalidRequest),
    async (c): Promise<Response> => {
        // 1. リクエストボディからバリデーション済みデータを取得
        const request = c.req.valid('json');

        // 2. DIコンテナからユースケースを取得
        const openAccountUseCase = container.resolve<OpenAccountUseCase>(OpenAccountUseCaseToken);

        // 3. ユースケースを実行
        const result = await openAccountUseCase.openAccount(toOpenAccountCommand(request));

        if (!result.success) {
            return respondWithAccountError(c, result.error);
        }

        const account = result.data;
        return c.json(toSuccessResponse('Account opened', account.getId(), account.getBalance()), 201);
    }
);

/**
 * GET /api/accounts/:accountId/balance
 */
accountRouter.get(
    '/accounts/:accountId/balance',
    zValidator('param', AccountParamSchema, rejectInvalidRequest),
    async (c): Promise<Response> => {
        const {accountId} = c.req.valid('param');
        const id = new AccountId(accountId);

        const query = container.resolve<GetAccountBalanceQuery>(GetAccountBalanceQueryToken);
        const result = await query.getAccountBalance(id);

        if (!result.success) {
            return respondWithAccountError(c, result.error);
        }

        return c.json(toSuccessResponse('Balance retrieved', id, result.data), 200);
    }
);

/**
 * POST /api/accounts/:accountId/deposit
 * JSONボディ { amount } で入金
 */
accountRouter.post(
    '/accounts/:accountId/deposit',
    zValidator('param', AccountParamSchema, rejectInvalidRequest),
    zValidator('json', MoneyWebRequestSchema, rejectInvalidRequest),
    async (c): Promise<Response> => {
        const {accountId} = c.req.valid('param');
        const command = toDepositCommand(accountId, c.req.valid('json'));

        const depositMoneyUseCase = container.resolve<DepositMoneyUseCase>(DepositMoneyUseCaseToken);
        const result = await depositMoneyUseCase.depositMoney(command);

        if (!result.success) {
            return respondWithAccountError(c, result.error);
        }

        return c.json(toSuccessResponse('Deposit completed', command.accountId, result.data), 200);
    }
);

/**
 * POST /api/accounts/:accountId/withdraw
 * JSONボディ { amount } で出金
 */
accountRouter.post(
    '/accounts/:accountId/withdraw',
    zValidator('param', AccountParamSchema, rejectInvalidRequest),
    zValidator('json', MoneyWebRequestSchema, rejectInvalidRequest),
    async (c): Promise<Response> => {
        const {accountId} = c.req.valid('param');
        const command = toWithdrawCommand(accountId, c.req.valid('json'));

        const withdrawMoneyUseCase = container.resolve<WithdrawMoneyUseCase>(WithdrawMoneyUseCaseToken);
        const result = await withdrawMoneyUseCase.withdrawMoney(command);

        if (!result.success) {
            return respondWithAccountError(c, result.error);
        }

        return c.json(toSuccessResponse('Withdrawal completed', command.accountId, result.data), 200);
    }
);
