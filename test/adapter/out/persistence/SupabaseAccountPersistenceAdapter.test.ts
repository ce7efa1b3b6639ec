import "reflect-metadata";

import {beforeEach, describe, expect, it} from "vitest";
import {
    SupabaseAccountPersistenceAdapter
} from "../../../../src/account/adapter/out/persistence/SupabaseAccountPersistenceAdapter";
import {Account} from "../../../../src/account/application/domain/model/Account";
import {AccountId} from "../../../../src/account/application/domain/model/AccountId";
import {Money} from "../../../../src/account/application/domain/model/Money";
import type {DatabaseConfig} from "../../../../src/config/types";
import {FakePostgrest} from "../../../helpers/fakePostgrest";

/**
 * SupabaseAccountPersistenceAdapter のテスト
 *
 * 【テスト戦略】
 * - supabase-js は本物を使い、fetch だけをプロセス内のスタンドイン（FakePostgrest）に差し替える
 *   → アダプターが組み立てるクエリ（eq / upsert / insert / update ... select）が実際に送られる
 * - スタンドインは accounts テーブルを Map で持つので、結果を直接確認できる
 */
describe("SupabaseAccountPersistenceAdapter", () => {
    let postgrest: FakePostgrest;
    let adapter: SupabaseAccountPersistenceAdapter;

    const ACCOUNT_ID = "12345";

    const createAdapter = (maxUpdateAttempts = 5): SupabaseAccountPersistenceAdapter => {
        const config: DatabaseConfig = {
            url: "http://localhost:54321",
            key: "test-publishable-key",
            maxUpdateAttempts,
        };
        return new SupabaseAccountPersistenceAdapter(postgrest.createClient(), config);
    };

    const patchRequests = (): string[] =>
        postgrest.requests.filter((request) => request.startsWith("PATCH"));

    beforeEach(() => {
        postgrest = new FakePostgrest();
        postgrest.accounts.set(ACCOUNT_ID, 100);
        adapter = createAdapter();
    });

    // ========================================
    // initialize
    // ========================================

    describe("initialize", () => {
        it("ensure_accounts_table を呼び出す", async () => {
            // ===== Act =====
            const result = await adapter.initialize();

            // ===== Assert =====
            expect(result.success).toBe(true);
            expect(postgrest.requests).toContain("POST /rest/v1/rpc/ensure_accounts_table");
        });

        it("何度呼んでも成功する（冪等）", async () => {
            await adapter.initialize();
            const result = await adapter.initialize();

            expect(result.success).toBe(true);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(100);
        });

        it("DBエラーは StorageFailure になる", async () => {
            postgrest.failAllRequests(500, {code: "XX000", message: "connection refused"});

            const result = await adapter.initialize();

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("StorageFailure");
                expect(result.error.operation).toBe("initialize");
            }
        });
    });

    // ========================================
    // loadAccount
    // ========================================

    describe("loadAccount", () => {
        it("アカウントを読み込める", async () => {
            // ===== Act =====
            const result = await adapter.loadAccount(new AccountId(ACCOUNT_ID));

            // ===== Assert =====
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.getId().getValue()).toBe(ACCOUNT_ID);
                expect(result.data.getBalance().getAmount()).toBe(100);
            }
        });

        it("存在しないアカウントは AccountNotFound", async () => {
            const result = await adapter.loadAccount(new AccountId("99999"));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("AccountNotFound");
                expect(result.error.message).toBe("Account not found: 99999");
            }
        });

        it("不正な行（負の残高）は StorageFailure", async () => {
            postgrest.accounts.set("broken", -5);

            const result = await adapter.loadAccount(new AccountId("broken"));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("StorageFailure");
            }
        });

        it("DBエラーの内容は利用者向けメッセージに含まれない", async () => {
            postgrest.failAllRequests(500, {code: "XX000", message: "connection refused"});

            const result = await adapter.loadAccount(new AccountId(ACCOUNT_ID));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("StorageFailure");
                expect(result.error.message).toBe("Storage operation failed: loadAccount");
            }
        });
    });

    // ========================================
    // saveAccount（upsert）
    // ========================================

    describe("saveAccount", () => {
        it("存在しないアカウントは作成される", async () => {
            const account = Account.withBalance(new AccountId("777"), Money.of(42.5));

            const result = await adapter.saveAccount(account);

            expect(result.success).toBe(true);
            expect(postgrest.accounts.get("777")).toBe(42.5);
        });

        it("既存のアカウントは上書きされる", async () => {
            const account = Account.withBalance(new AccountId(ACCOUNT_ID), Money.of(150));

            const result = await adapter.saveAccount(account);

            expect(result.success).toBe(true);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(150);
        });

        it("同じ状態を2回保存しても結果は同じ", async () => {
            const account = Account.withBalance(new AccountId(ACCOUNT_ID), Money.of(150));

            await adapter.saveAccount(account);
            await adapter.saveAccount(account);

            expect(postgrest.accounts.size).toBe(1);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(150);
        });

        it("保存したアカウントを読み込むと同じ残高が返る", async () => {
            await adapter.saveAccount(Account.withBalance(new AccountId("888"), Money.of(0.1)));

            const loaded = await adapter.loadAccount(new AccountId("888"));

            expect(loaded.success).toBe(true);
            if (loaded.success) {
                expect(loaded.data.getBalance().getAmount()).toBe(0.1);
            }
        });
    });

    // ========================================
    // createAccount（insert）
    // ========================================

    describe("createAccount", () => {
        it("新しいアカウントを作成できる", async () => {
            const opened = Account.open(new AccountId("555"), Money.of(20));
            if (!opened.success) {
                throw opened.error;
            }

            const result = await adapter.createAccount(opened.data);

            expect(result.success).toBe(true);
            expect(postgrest.accounts.get("555")).toBe(20);
        });

        it("既に存在する場合は AccountAlreadyExists で、既存の残高は変わらない", async () => {
            const account = Account.withBalance(new AccountId(ACCOUNT_ID), Money.of(0));

            const result = await adapter.createAccount(account);

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("AccountAlreadyExists");
            }
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(100);
        });
    });

    // ========================================
    // updateBalance（条件付きUPDATE + 再試行）
    // ========================================

    describe("updateBalance", () => {
        it("ロード → 変更 → 保存 を行い、保存後のAccountを返す", async () => {
            // ===== Act =====
            const result = await adapter.updateBalance(
                new AccountId(ACCOUNT_ID),
                (account) => account.deposit(Money.of(50))
            );

            // ===== Assert =====
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.getBalance().getAmount()).toBe(150);
            }
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(150);
            expect(patchRequests()).toHaveLength(1);
        });

        it("変更が失敗したら書き込まない", async () => {
            const result = await adapter.updateBalance(
                new AccountId(ACCOUNT_ID),
                (account) => account.withdraw(Money.of(200))
            );

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("InsufficientFunds");
            }
            expect(patchRequests()).toHaveLength(0);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(100);
        });

        it("存在しないアカウントは AccountNotFound で、変更関数は呼ばれない", async () => {
            let called = false;

            const result = await adapter.updateBalance(new AccountId("99999"), (account) => {
                called = true;
                return account.deposit(Money.of(1));
            });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("AccountNotFound");
            }
            expect(called).toBe(false);
        });

        it("読んだ後に残高が変わっていたら、読み直して再試行する", async () => {
            // ===== Arrange =====
            // 1回目の UPDATE の直前に、別の書き込みが残高を 110 にする
            postgrest.onceBeforePatch(() => {
                postgrest.accounts.set(ACCOUNT_ID, 110);
            });

            // ===== Act =====
            const result = await adapter.updateBalance(
                new AccountId(ACCOUNT_ID),
                (account) => account.deposit(Money.of(10))
            );

            // ===== Assert =====
            // 110 を読み直して +10 → 120（どちらの更新も失われない）
            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.data.getBalance().getAmount()).toBe(120);
            }
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(120);
            expect(patchRequests()).toHaveLength(2);
        });

        it("競合が続いたら maxUpdateAttempts 回で諦めて StorageFailure", async () => {
            adapter = createAdapter(3);
            postgrest.beforeEachPatch(() => {
                postgrest.accounts.set(ACCOUNT_ID, (postgrest.accounts.get(ACCOUNT_ID) ?? 0) + 1);
            });

            const result = await adapter.updateBalance(
                new AccountId(ACCOUNT_ID),
                (account) => account.deposit(Money.of(10))
            );

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("StorageFailure");
            }
            expect(patchRequests()).toHaveLength(3);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(103);
        });

        it("同時に2件の入金（各10）をしても、残高は 100 → 120 になる", async () => {
            const deposit = () =>
                adapter.updateBalance(
                    new AccountId(ACCOUNT_ID),
                    (account) => account.deposit(Money.of(10))
                );

            const results = await Promise.all([deposit(), deposit()]);

            expect(results.map((result) => result.success)).toEqual([true, true]);
            expect(postgrest.accounts.get(ACCOUNT_ID)).toBe(120);
        });
    });

    // ========================================
    // close
    // ========================================

    describe("close", () => {
        it("例外なく終了できる", async () => {
            await expect(adapter.close()).resolves.toBeUndefined();
        });
    });
});
