import "reflect-metadata";

import {afterEach, describe, expect, it} from "vitest";
import {container} from "tsyringe";
import {
    InMemoryAccountPersistenceAdapter
} from "../../src/account/adapter/out/persistence/InMemoryAccountPersistenceAdapter";
import {
    SupabaseAccountPersistenceAdapter
} from "../../src/account/adapter/out/persistence/SupabaseAccountPersistenceAdapter";
import {type AccountStorePort, AccountStorePortToken} from "../../src/account/application/port/out/AccountStorePort";
import {resetContainer, setupContainer} from "../../src/config/container";
import {loadConfig} from "../../src/config/env";

/**
 * setupContainer のテスト
 *
 * Supabase のクライアントは作成するだけで、通信はしない。
 */
describe("setupContainer", () => {
    afterEach(async () => {
        await container.resolve<AccountStorePort>(AccountStorePortToken).close();
        resetContainer();
    });

    it("USE_SUPABASE=true なら Supabase のストアが解決される", () => {
        setupContainer(loadConfig({
            USE_SUPABASE: "true",
            SUPABASE_URL: "http://localhost:54321",
            SUPABASE_PUBLISHABLE_KEY: "test-publishable-key",
        }));

        const store = container.resolve<AccountStorePort>(AccountStorePortToken);

        expect(store).toBeInstanceOf(SupabaseAccountPersistenceAdapter);
    });

    it("既定では InMemory のストアが解決される", () => {
        setupContainer(loadConfig({}));

        const store = container.resolve<AccountStorePort>(AccountStorePortToken);

        expect(store).toBeInstanceOf(InMemoryAccountPersistenceAdapter);
    });
});
