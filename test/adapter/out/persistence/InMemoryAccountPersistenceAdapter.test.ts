import "reflect-metadata";

import {beforeEach, describe, expect, it} from "vitest";
import {InMemoryAccountPersistenceAdapter} from "../../../../src/account/adapter/out/persistence/InMemoryAccountPersistenceAdapter";
import {InProcessAccountLock} from "../../../../src/account/adapter/out/persistence/InProcessAccountLock";
import {Account} from "../../../../src/account/application/domain/model/Account";
import {AccountId} from "../../../../src/account/application/domain/model/AccountId";
import {Money} from "../../../../src/account/application/domain/model/Money";

describe("InMemoryAccountPersistenceAdapter", () => {
    let lock: InProcessAccountLock;
    let adapter: InMemoryAccountPersistenceAdapter;

    const accountId = new AccountId("12345");

    beforeEach(async () => {
        lock = new InProcessAccountLock();
        adapter = new InMemoryAccountPersistenceAdapter(lock);
        await adapter.initialize();
        await adapter.saveAccount(Account.withBalance(accountId, Money.of(100)));
    });

    describe("loadAccount", () => {
        it("保存済みのアカウントを読み込める", async () => {
            const result = await adapter.loadAccount(accountId);

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.getBalance().getAmount()).toBe(100);
            }
        });

        it("存在しないアカウントは AccountNotFound（デフォルトのアカウントは作らない）", async () => {
            const result = await adapter.loadAccount(new AccountId("99999"));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("AccountNotFound");
            }
        });

        it("返されるAccountはストアから切り離されている", async () => {
            const loaded = await adapter.loadAccount(accountId);
            if (!loaded.success) {
                throw loaded.error;
            }

            // 保存せずに変更する
            loaded.data.deposit(Money.of(999));

            const reloaded = await adapter.loadAccount(accountId);
            expect(reloaded.success).toBe(true);
            if (reloaded.success) {
                expect(reloaded.data.getBalance().getAmount()).toBe(100);
            }
        });
    });

    describe("saveAccount", () => {
        it("同じ状態を2回保存しても結果は同じ（upsert）", async () => {
            const account = Account.withBalance(accountId, Money.of(150));

            await adapter.saveAccount(account);
            await adapter.saveAccount(account);

            const result = await adapter.loadAccount(accountId);
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.getBalance().getAmount()).toBe(150);
            }
        });
    });

    describe("createAccount", () => {
        it("既に存在する場合は AccountAlreadyExists で、残高は変わらない", async () => {
            const result = await adapter.createAccount(Account.withBalance(accountId, Money.ZERO));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("AccountAlreadyExists");
            }

            const loaded = await adapter.loadAccount(accountId);
            expect(loaded.success && loaded.data.getBalance().getAmount()).toBe(100);
        });
    });

    describe("updateBalance", () => {
        it("変更が失敗したら保存しない", async () => {
            const result = await adapter.updateBalance(accountId, (account) => account.withdraw(Money.of(200)));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("InsufficientFunds");
            }

            const loaded = await adapter.loadAccount(accountId);
            expect(loaded.success && loaded.data.getBalance().getAmount()).toBe(100);
        });

        it("同時に2件の入金（各10）をしても、残高は 100 → 120 になる", async () => {
            const deposit = () => adapter.updateBalance(accountId, (account) => account.deposit(Money.of(10)));

            const results = await Promise.all([deposit(), deposit()]);

            expect(results.map((result) => result.success && result.data.getBalance().getAmount())).toEqual([110, 120]);

            const loaded = await adapter.loadAccount(accountId);
            expect(loaded.success && loaded.data.getBalance().getAmount()).toBe(120);
            expect(lock.size()).toBe(0);
        });
    });

    /**
     * 一連の操作（新しいストア、12345 / 100 から開始）
     */
    it("入金 → 残高不足の出金 → 全額出金 → 存在しないアカウント", async () => {
        // 入金 50 → 150
        const deposited = await adapter.updateBalance(accountId, (account) => account.deposit(Money.of(50)));
        expect(deposited.success && deposited.data.getBalance().getAmount()).toBe(150);

        // 出金 200 → 残高不足、150 のまま
        const overdrawn = await adapter.updateBalance(accountId, (account) => account.withdraw(Money.of(200)));
        expect(!overdrawn.success && overdrawn.error.kind).toBe("InsufficientFunds");
        const afterOverdraw = await adapter.loadAccount(accountId);
        expect(afterOverdraw.success && afterOverdraw.data.getBalance().getAmount()).toBe(150);

        // 出金 150 → 0
        const emptied = await adapter.updateBalance(accountId, (account) => account.withdraw(Money.of(150)));
        expect(emptied.success && emptied.data.getBalance().getAmount()).toBe(0);

        // 99999 → AccountNotFound
        const missing = await adapter.loadAccount(new AccountId("99999"));
        expect(!missing.success && missing.error.kind).toBe("AccountNotFound");
    });
});
