import {z} from 'zod';
import {InvalidLedgerInputException} from '../../domain/exception/InvalidLedgerInputException';

const RedeemRewardCommandSchema = z.object({
    rewardName: z.string().min(1, 'reward name must not be empty'),
});

/**
 * ご褒美交換コマンド
 */
export class RedeemRewardCommand {
    public readonly rewardName: string;

    constructor(rewardName: string) {
        const result = RedeemRewardCommandSchema.safeParse({rewardName});
        if (!result.success) {
            throw new InvalidLedgerInputException(
                'rewardName',
                result.error.issues.map((e) => e.message).join(', ')
            );
        }
        this.rewardName = result.data.rewardName;
    }
}
