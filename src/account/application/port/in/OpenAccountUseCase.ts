import type {Result} from '../../../../common/result/Result';
import type {OpenAccountError} from '../../domain/exception/AccountError';
import type {Account} from '../../domain/model/Account';
import type {OpenAccountCommand} from './OpenAccountCommand';

/**
 * 口座開設ユースケースのインターフェース（入力ポート）
 */
export interface OpenAccountUseCase {
    /**
     * 口座を開設する
     *
     * 同じIDの口座が既にある場合は AccountAlreadyExists を返し、既存の残高は変更しない。
     */
    openAccount(command: OpenAccountCommand): Promise<Result<Account, OpenAccountError>>;
}

/**
 * DI用のシンボル
 */
export const OpenAccountUseCaseToken = Symbol('OpenAccountUseCase');
