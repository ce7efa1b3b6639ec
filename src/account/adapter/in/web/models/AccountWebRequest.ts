import { z } from 'zod';

/**
 * 金額: JSONの数値、または数値として読める文字列
 *
 * 符号のチェックはドメイン側（Account）で行う。
 */
export const AmountSchema = z.union([
    z.number().finite(),
    z
        .string()
        .trim()
        .regex(/^-?\d+(\.\d+)?$/, 'amount must be a numeric string')
        .transform(Number)
        .pipe(z.number().finite()),
]);

/**
 * アカウントID: 前後の空白を除いた空でない文字列
 */
const AccountIdSchema = z.string().trim().min(1, 'accountId must not be empty');

/**
 * パスパラメータ用のバリデーションスキーマ
 */
export const AccountParamSchema = z.object({
    accountId: AccountIdSchema,
});

/**
 * 入金・出金のJSONボディ
 */
export const MoneyWebRequestSchema = z.object({
    amount: AmountSchema,
});

/**
 * 口座開設のJSONボディ
 */
export const OpenAccountWebRequestSchema = z.object({
    accountId: AccountIdSchema,
    initialBalance: AmountSchema.optional(),
});

/**
 * Web層専用のリクエストモデル
 * プリミティブ型のみを使用してドメインモデルへの依存を排除
 */
export type MoneyWebRequest = z.infer<typeof MoneyWebRequestSchema>;
export type OpenAccountWebRequest = z.infer<typeof OpenAccountWebRequestSchema>;
