import {z} from 'zod';
import {InvalidLedgerInputException} from '../../domain/exception/InvalidLedgerInputException';
import type {CalendarDate} from '../../domain/model/CalendarDate';
import {MAX_ENTRY_POINTS, MIN_ENTRY_POINTS, Points} from '../../domain/model/Points';

/**
 * 保護者による任意の加減算コマンドのバリデーションスキーマ
 *
 * - activity: 前後の空白を除いて1文字以上
 * - points: 0 以外の32ビット整数（負なら減算）
 */
const AdjustPointsCommandSchema = z.object({
    activity: z.string().trim().min(1, 'activity must not be blank'),
    points: z
        .number()
        .int('points must be an integer')
        .min(MIN_ENTRY_POINTS, `points must be at least ${MIN_ENTRY_POINTS}`)
        .max(MAX_ENTRY_POINTS, `points must be at most ${MAX_ENTRY_POINTS}`)
        .refine((value) => value !== 0, {message: 'points must not be zero'}),
    notes: z.string(),
});

/**
 * 保護者による任意の加減算コマンド
 *
 * 負の値は保護者の判断による減算なので、残高チェックはしない。
 */
export class AdjustPointsCommand {
    public readonly activity: string;
    public readonly points: Points;
    public readonly notes: string;

    /**
     * @param entryDate 記録する日付。省略時は今日
     */
    constructor(
        activity: string,
        points: number,
        public readonly entryDate: CalendarDate | null = null,
        notes = ''
    ) {
        const result = AdjustPointsCommandSchema.safeParse({activity, points, notes});
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new InvalidLedgerInputException(
                issue.path.join('.') || 'command',
                result.error.issues.map((e) => e.message).join(', ')
            );
        }

        this.activity = result.data.activity;
        this.points = Points.of(result.data.points);
        this.notes = result.data.notes;
    }
}
