/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {createClient} from '@supabase/supabase-js';
import {container, type InjectionToken} from 'tsyringe';
import {InMemoryAccountPersistenceAdapter} from '../account/adapter/out/persistence/InMemoryAccountPersistenceAdapter';
import {InProcessAccountLock} from '../account/adapter/out/persistence/InProcessAccountLock';
import {SupabaseAccountPersistenceAdapter} from '../account/adapter/out/persistence/SupabaseAccountPersistenceAdapter';
import {DepositMoneyUseCaseToken} from '../account/application/port/in/DepositMoneyUseCase';
import {GetAccountBalanceQueryToken} from '../account/application/port/in/GetAccountBalanceQuery';
import {OpenAccountUseCaseToken} from '../account/application/port/in/OpenAccountUseCase';
import {WithdrawMoneyUseCaseToken} from '../account/application/port/in/WithdrawMoneyUseCase';
import {AccountLockToken} from '../account/application/port/out/AccountLock';
import {type AccountStorePort, AccountStorePortToken} from '../account/application/port/out/AccountStorePort';
import {LoadAccountPortToken} from '../account/application/port/out/LoadAccountPort';
import {SaveAccountPortToken} from '../account/application/port/out/SaveAccountPort';
import {UpdateAccountBalancePortToken} from '../account/application/port/out/UpdateAccountBalancePort';
import {AccountApplicationService} from '../account/application/service/AccountApplicationService';
import type {AppConfig} from './env';
import type {DatabaseConfig, TypedSupabaseClient} from './types';
import {AppConfigToken, DatabaseConfigToken, SupabaseClientToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定オブジェクトの登録
 * 2. アカウントロックの登録
 * 3. 永続化アダプター（InMemory または Supabase）の登録
 * 4. アプリケーションサービス（UseCase実装）の登録
 *
 * @param config 環境変数から読み込んだ設定
 */
export function setupContainer(config: AppConfig): void {
    // 既に初期化済みなら何もしない（冪等性の確保）
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定オブジェクトの登録
    // ========================================

    container.register<AppConfig>(AppConfigToken, {
        useValue: config,
    });

    // ========================================
    // 2. アカウントロック機構の登録
    // ========================================

    /**
     * InProcessAccountLock: 同じアカウントへの更新を1つずつ実行する
     * ロック待ちの状態を共有するため、シングルトンで登録する
     */
    container.registerSingleton(AccountLockToken, InProcessAccountLock);

    // ========================================
    // 3. 出力アダプター（永続化層）の登録
    // ========================================

    /**
     * 実装は環境変数で切り替える：
     * - USE_SUPABASE=true  → SupabaseAccountPersistenceAdapter
     * - USE_SUPABASE=false → InMemoryAccountPersistenceAdapter
     *
     * Application層は各Port（インターフェース）にしか依存しない。
     */
    if (config.USE_SUPABASE) {
        console.log('📦 Using Supabase adapter');

        if (config.SUPABASE_URL === undefined || config.SUPABASE_PUBLISHABLE_KEY === undefined) {
            throw new Error('SUPABASE_URL and SUPABASE_PUBLISHABLE_KEY must be set when USE_SUPABASE=true');
        }

        const dbConfig: DatabaseConfig = {
            url: config.SUPABASE_URL,
            key: config.SUPABASE_PUBLISHABLE_KEY,
            maxUpdateAttempts: config.SUPABASE_MAX_UPDATE_ATTEMPTS,
        };

        container.register<DatabaseConfig>(DatabaseConfigToken, {
            useValue: dbConfig,
        });

        const supabaseClient = createClient(dbConfig.url, dbConfig.key, {
            auth: {
                persistSession: false, // サーバー / CLI ではセッション永続化不要
                autoRefreshToken: false,
            },
            global: {
                headers: {
                    'x-application-name': 'balance-keeper',
                },
            },
        });

        container.register<TypedSupabaseClient>(SupabaseClientToken, {
            useValue: supabaseClient,
        });

        registerAccountStore(SupabaseAccountPersistenceAdapter);
    } else {
        console.log('💾 Using InMemory adapter');

        registerAccountStore(InMemoryAccountPersistenceAdapter);
    }

    // ========================================
    // 4. アプリケーションサービスの登録
    // ========================================

    /**
     * AccountApplicationService は4つのユースケースを実装している。
     * どのTokenで resolve しても同じインスタンスが返るよう、useToken で紐付ける。
     */
    container.registerSingleton(AccountApplicationService, AccountApplicationService);

    container.register(DepositMoneyUseCaseToken, {
        useToken: AccountApplicationService,
    });

    container.register(WithdrawMoneyUseCaseToken, {
        useToken: AccountApplicationService,
    });

    container.register(GetAccountBalanceQueryToken, {
        useToken: AccountApplicationService,
    });

    container.register(OpenAccountUseCaseToken, {
        useToken: AccountApplicationService,
    });

    isInitialized = true;
    console.log(`✅ DI container initialized (Supabase: ${config.USE_SUPABASE ? 'enabled' : 'disabled'})`);
}

/**
 * アカウントストアをシングルトンで登録し、各Portをそのインスタンスに紐付ける
 *
 * - LoadAccountPortToken / SaveAccountPortToken / UpdateAccountBalancePortToken
 *   → サービスが使う
 * - AccountStorePortToken
 *   → 初期化・クローズのために app-initializer が使う
 */
function registerAccountStore(adapter: InjectionToken<AccountStorePort>): void {
    container.registerSingleton(adapter, adapter);

    for (const token of [
        AccountStorePortToken,
        LoadAccountPortToken,
        SaveAccountPortToken,
        UpdateAccountBalancePortToken,
    ]) {
        container.register(token, {
            useToken: adapter,
        });
    }
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * 登録済みのインスタンスと useValue の登録を破棄し、次の setupContainer で作り直せるようにする。
 */
export function resetContainer(): void {
    container.clearInstances();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
