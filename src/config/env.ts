import {z} from 'zod';

/**
 * 環境変数のスキーマ
 *
 * ローカル開発では .env（dotenv）から、本番ではプロセスの環境変数から読み込む。
 * 空文字は「未設定」として扱う。
 */
const optionalString = z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const AppEnvSchema = z
    .object({
        LEDGER_STORE: z.enum(['memory', 'postgres', 'supabase']).default('memory'),
        SUPABASE_URL: optionalString,
        SUPABASE_PUBLISHABLE_KEY: optionalString,
        SUPABASE_DB_URL: optionalString,
        DATABASE_SSL: z.enum(['require', 'disable']).default('require'),
        PARENT_PIN: optionalString,
        TIME_ZONE: optionalString,
        POINTS_BANK_CONFIG: optionalString,
        PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    })
    .superRefine((env, ctx) => {
        if (env.LEDGER_STORE === 'supabase') {
            if (!env.SUPABASE_URL) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['SUPABASE_URL'],
                    message: 'SUPABASE_URL is required when LEDGER_STORE=supabase',
                });
            }
            if (!env.SUPABASE_PUBLISHABLE_KEY) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['SUPABASE_PUBLISHABLE_KEY'],
                    message: 'SUPABASE_PUBLISHABLE_KEY is required when LEDGER_STORE=supabase',
                });
            }
        }
        if (env.LEDGER_STORE === 'postgres' && !env.SUPABASE_DB_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_DB_URL'],
                message: 'SUPABASE_DB_URL is required when LEDGER_STORE=postgres',
            });
        }
        if (env.TIME_ZONE && !isSupportedTimeZone(env.TIME_ZONE)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['TIME_ZONE'],
                message: `Unknown time zone: ${env.TIME_ZONE}`,
            });
        }
    });

/**
 * アプリケーションの環境設定
 */
export type AppEnv = z.infer<typeof AppEnvSchema>;

function isSupportedTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', {timeZone});
        return true;
    } catch {
        return false;
    }
}

/**
 * 環境変数を検証して AppEnv を作る
 *
 * @param source 読み込み元（既定は process.env）
 * @throws Error 必須の値が欠けている、または形式が不正な場合
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): AppEnv {
    const result = AppEnvSchema.safeParse(source);
    if (!result.success) {
        throw new Error(
            `Invalid environment: ${result.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ')}`
        );
    }
    return result.data;
}
