import type {AccountId} from '../model/AccountId';

/**
 * 同じIDのアカウントが既に存在する（口座開設時）
 */
export class AccountAlreadyExistsException extends Error {
    readonly kind = 'AccountAlreadyExists';

    constructor(public readonly accountId: AccountId) {
        super(`Account already exists: ${accountId.getValue()}`);
        this.name = 'AccountAlreadyExistsException';
    }
}
