import {z} from 'zod';

/**
 * points_log テーブル名
 */
export const POINTS_LOG_TABLE = 'points_log';

/**
 * 整数カラム
 * ドライバーによっては数値が文字列で返るので、整数表記の文字列だけ数値に変換する。
 * null や小数は変換せずに拒否する。
 */
const IntegerColumnSchema = z
    .union([
        z.number(),
        z.string().regex(/^-?\d+$/, 'must be an integer').transform(Number),
    ])
    .pipe(
        z.number()
            .int()
            .min(Number.MIN_SAFE_INTEGER)
            .max(Number.MAX_SAFE_INTEGER)
    );

/**
 * points_log から取得したレコードのスキーマ
 *
 * ストア境界で行の形を検証する。
 * - id / points: 整数（id は正）
 * - entry_date: YYYY-MM-DD 文字列（時刻なし）
 * - notes: NULL 可（NULL は空文字として扱う）
 */
export const PersistedLedgerEntryRecordSchema = z.object({
    id: IntegerColumnSchema.refine((id) => id > 0, 'id must be positive'),
    entry_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'entry_date must be YYYY-MM-DD'),
    person: z.string(),
    activity: z.string(),
    points: IntegerColumnSchema,
    notes: z.string().nullable().optional(),
});

/**
 * points_log から取得したレコード（IDあり）
 */
export type PersistedLedgerEntryRecord = z.infer<typeof PersistedLedgerEntryRecordSchema>;

/**
 * points_log に挿入するレコード（IDはストアが採番）
 */
export interface LedgerEntryRecord {
    entry_date: string;
    person: string;
    activity: string;
    points: number;
    notes: string;
}

/**
 * INSERT ... RETURNING id の結果
 */
export const InsertedLedgerEntryIdSchema = z.object({
    id: IntegerColumnSchema.refine((id) => id > 0, 'id must be positive'),
});
