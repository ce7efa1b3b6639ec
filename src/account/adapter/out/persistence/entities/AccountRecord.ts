import {z} from 'zod';

/**
 * データベースの accounts テーブルの1行
 *
 * 生成された型定義は持たないため、取得した行は必ずこのスキーマで検証する。
 */
export const PersistedAccountRecordSchema = z.object({
    id: z.string().min(1),
    balance: z.number().finite().nonnegative(),
});

export type PersistedAccountRecord = z.infer<typeof PersistedAccountRecordSchema>;

/**
 * データベースに書き込むレコード（upsert / insert 用）
 */
export interface AccountRecord {
    id: string;
    balance: number;
}

/**
 * 残高の条件付き更新で返ってくる行（更新された行のIDのみ）
 */
export const UpdatedAccountRecordSchema = z.object({
    id: z.string(),
});
