import {z} from 'zod';
import {InvalidLedgerInputException} from '../../domain/exception/InvalidLedgerInputException';

const QuickEarnCommandSchema = z.object({
    label: z.string().min(1, 'label must not be empty'),
});

/**
 * クイック獲得コマンド
 * カタログに登録されたラベルを指定して、そのポイントを今日の日付で記録する
 */
export class QuickEarnCommand {
    public readonly label: string;

    constructor(label: string) {
        const result = QuickEarnCommandSchema.safeParse({label});
        if (!result.success) {
            throw new InvalidLedgerInputException(
                'label',
                result.error.issues.map((e) => e.message).join(', ')
            );
        }
        this.label = result.data.label;
    }
}
