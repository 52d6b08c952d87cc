import {z} from 'zod';
import {MAX_ENTRY_POINTS, MIN_ENTRY_POINTS} from '../../../../application/domain/model/Points';

/**
 * Web層専用のリクエストモデル
 * プリミティブ型のみを使用してドメインモデルへの依存を排除
 */
export interface QuickEarnWebRequest {
    label: string;
}

export interface RedeemRewardWebRequest {
    name: string;
}

export interface AdjustPointsWebRequest {
    activity: string;
    points: number;
    entryDate?: string;
    notes?: string;
}

/**
 * JSONボディ用のバリデーションスキーマ
 */
export const QuickEarnWebRequestSchema = z.object({
    label: z.string().min(1, 'label must not be empty'),
});

export const RedeemRewardWebRequestSchema = z.object({
    name: z.string().min(1, 'name must not be empty'),
});

/**
 * activity の空白チェックと 0 ポイントの拒否はコマンド側で行う
 * （ここでは型と形式だけを見る）
 */
export const AdjustPointsWebRequestSchema = z.object({
    activity: z.string(),
    points: z
        .number()
        .int('points must be an integer')
        .min(MIN_ENTRY_POINTS, `points must be at least ${MIN_ENTRY_POINTS}`)
        .max(MAX_ENTRY_POINTS, `points must be at most ${MAX_ENTRY_POINTS}`),
    entryDate: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'entryDate must be YYYY-MM-DD')
        .optional(),
    notes: z.string().optional(),
});

/**
 * パスパラメータ用のバリデーションスキーマ
 * （URLパラメータは常に文字列）
 */
export const EntryIdParamSchema = z.object({
    id: z.string().regex(/^[1-9]\d*$/, 'id must be a positive integer'),
});
