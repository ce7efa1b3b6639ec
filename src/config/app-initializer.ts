import {container} from 'tsyringe';
import {AccountId} from '../account/application/domain/model/AccountId';
import {Money} from '../account/application/domain/model/Money';
import {OpenAccountCommand} from '../account/application/port/in/OpenAccountCommand';
import type {OpenAccountUseCase} from '../account/application/port/in/OpenAccountUseCase';
import {OpenAccountUseCaseToken} from '../account/application/port/in/OpenAccountUseCase';
import type {AccountStorePort} from '../account/application/port/out/AccountStorePort';
import {AccountStorePortToken} from '../account/application/port/out/AccountStorePort';
import {resetContainer, setupContainer} from './container';
import type {AppConfig} from './env';

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. アカウントストアの初期化（テーブル作成）
 * 3. 初期アカウントの用意（なければ作成）
 */

let isInitialized = false

export async function initializeApplication(config: AppConfig): Promise<void> {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    // ① DIコンテナの設定
    setupContainer(config)

    // ② ストアの初期化（冪等）
    const store = container.resolve<AccountStorePort>(AccountStorePortToken)
    const initialized = await store.initialize()

    if (!initialized.success) {
        await shutdownApplication()
        throw new Error('Failed to initialize the account store', {cause: initialized.error})
    }

    // ③ 初期アカウント
    await ensureBootstrapAccount(config)

    isInitialized = true
    console.log('✅ Application initialized')
}

/**
 * 初期アカウントがなければ作成する
 *
 * 既にある場合は残高を変更しない。
 */
async function ensureBootstrapAccount(config: AppConfig): Promise<void> {
    const openAccountUseCase = container.resolve<OpenAccountUseCase>(OpenAccountUseCaseToken)

    const result = await openAccountUseCase.openAccount(
        new OpenAccountCommand(
            new AccountId(config.BOOTSTRAP_ACCOUNT_ID),
            Money.of(config.BOOTSTRAP_ACCOUNT_BALANCE)
        )
    )

    if (result.success) {
        return
    }

    if (result.error.kind === 'AccountAlreadyExists') {
        console.log(`🏦 Bootstrap account ${config.BOOTSTRAP_ACCOUNT_ID} already exists`)
        return
    }

    await shutdownApplication()
    throw new Error(`Failed to create bootstrap account ${config.BOOTSTRAP_ACCOUNT_ID}`, {cause: result.error})
}

/**
 * ストアを閉じてコンテナをリセットする
 */
export async function shutdownApplication(): Promise<void> {
    const store = container.resolve<AccountStorePort>(AccountStorePortToken)
    await store.close()

    resetContainer()
    isInitialized = false
    console.log('👋 Application shut down')
}

/**
 * 初期化 → task → 終了処理 をまとめて実行する
 *
 * task が失敗しても終了処理は必ず行う。
 */
export async function runWithApplication<T>(config: AppConfig, task: () => Promise<T>): Promise<T> {
    await initializeApplication(config)

    try {
        return await task()
    } finally {
        await shutdownApplication()
    }
}
