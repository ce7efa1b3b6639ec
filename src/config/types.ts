import type {SupabaseClient} from '@supabase/supabase-js';

/**
 * データベース接続設定
 */
export interface DatabaseConfig {
    url: string;
    key: string;
    /**
     * 残高の条件付き更新が競合したときの最大試行回数
     */
    maxUpdateAttempts: number;
}

/**
 * アカウントストアで使うSupabaseClient
 *
 * スキーマの型定義は持たず、行は AccountRecord のスキーマで検証する。
 */
export type TypedSupabaseClient = SupabaseClient;

/**
 * DI用のトークン
 */
export const DatabaseConfigToken = Symbol('DatabaseConfig');
export const SupabaseClientToken = Symbol('SupabaseClient');
export const AppConfigToken = Symbol('AppConfig');
