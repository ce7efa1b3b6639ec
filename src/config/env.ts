import {z} from 'zod';

/**
 * 空文字の環境変数は「未設定」として扱う
 */
const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

/**
 * 環境変数のスキーマ
 *
 * 例: .env.example を参照
 */
export const AppConfigSchema = z
    .object({
        USE_SUPABASE: z
            .enum(['true', 'false'])
            .default('false')
            .transform((value) => value === 'true'),
        SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
        SUPABASE_PUBLISHABLE_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
        SUPABASE_MAX_UPDATE_ATTEMPTS: z.coerce.number().int().min(1).default(5),
        PORT: z.coerce.number().int().min(1).max(65535).default(3000),
        BOOTSTRAP_ACCOUNT_ID: z.string().min(1).default('12345'),
        BOOTSTRAP_ACCOUNT_BALANCE: z.coerce.number().finite().nonnegative().default(100),
    })
    .superRefine((env, ctx) => {
        if (!env.USE_SUPABASE) {
            return;
        }
        if (env.SUPABASE_URL === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_URL'],
                message: 'SUPABASE_URL is required when USE_SUPABASE=true',
            });
        }
        if (env.SUPABASE_PUBLISHABLE_KEY === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_PUBLISHABLE_KEY'],
                message: 'SUPABASE_PUBLISHABLE_KEY is required when USE_SUPABASE=true',
            });
        }
    });

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * 環境変数から設定を読み込む
 *
 * 不正な値があれば、どの変数が悪いかを並べたエラーを投げる。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = AppConfigSchema.safeParse(env);

    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new Error(`Invalid configuration: ${details}`);
    }

    return result.data;
}
