import type {AccountId} from '../model/AccountId';

/**
 * 指定IDのアカウントが存在しない
 *
 * デフォルトのアカウントを返すことはなく、常にこのエラーになる。
 */
export class AccountNotFoundException extends Error {
    readonly kind = 'AccountNotFound';

    constructor(public readonly accountId: AccountId) {
        super(`Account not found: ${accountId.getValue()}`);
        this.name = 'AccountNotFoundException';
    }
}
