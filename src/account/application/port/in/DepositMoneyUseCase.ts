import type {Result} from '../../../../common/result/Result';
import type {DepositError} from '../../domain/exception/AccountError';
import type {Money} from '../../domain/model/Money';
import type {DepositMoneyCommand} from './DepositMoneyCommand';

/**
 * 入金ユースケースのインターフェース（入力ポート）
 */
export interface DepositMoneyUseCase {
    /**
     * 入金を実行
     *
     * @returns 成功時は入金後の残高
     */
    depositMoney(command: DepositMoneyCommand): Promise<Result<Money, DepositError>>;
}

/**
 * DI用のシンボル
 */
export const DepositMoneyUseCaseToken = Symbol('DepositMoneyUseCase');
