import type {Result} from '../../../../common/result/Result';
import type {WithdrawError} from '../../domain/exception/AccountError';
import type {Money} from '../../domain/model/Money';
import type {WithdrawMoneyCommand} from './WithdrawMoneyCommand';

/**
 * 出金ユースケースのインターフェース（入力ポート）
 */
export interface WithdrawMoneyUseCase {
    /**
     * 出金を実行
     *
     * @returns 成功時は出金後の残高
     */
    withdrawMoney(command: WithdrawMoneyCommand): Promise<Result<Money, WithdrawError>>;
}

/**
 * DI用のシンボル
 */
export const WithdrawMoneyUseCaseToken = Symbol('WithdrawMoneyUseCase');
