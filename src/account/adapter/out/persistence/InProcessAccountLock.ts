import {injectable} from 'tsyringe';
import type {AccountId} from '../../../application/domain/model/AccountId';
import type {AccountLock} from '../../../application/port/out/AccountLock';

/**
 * アカウントロックのプロセス内実装
 *
 * アカウントIDごとに Promise のチェーンを持ち、task を到着順に1つずつ実行する。
 * 複数プロセスにまたがる排他はできない（それはストア側の責務）。
 */
@injectable()
export class InProcessAccountLock implements AccountLock {
    /**
     * キー: アカウントID
     * 値: そのアカウントで最後に登録された task の完了を表す Promise
     */
    private readonly tails = new Map<string, Promise<void>>();

    async withAccountLock<T>(accountId: AccountId, task: () => Promise<T>): Promise<T> {
        const key = accountId.getValue();
        const previous = this.tails.get(key) ?? Promise.resolve();

        const run = previous.then(task);
        // 後続の task は成否に関係なく開始できる。失敗は呼び出し元に await run で伝わる
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);

        try {
            return await run;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /**
     * ロック待ちまたは実行中のアカウント数（テスト用）
     */
    size(): number {
        return this.tails.size;
    }
}
