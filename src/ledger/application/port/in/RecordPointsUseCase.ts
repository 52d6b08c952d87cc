import type {LedgerEntryId} from '../../domain/model/LedgerEntry';
import type {AdjustPointsCommand} from './AdjustPointsCommand';
import type {QuickEarnCommand} from './QuickEarnCommand';
import type {RedeemRewardCommand} from './RedeemRewardCommand';

/**
 * 台帳への書き込みユースケース（入力ポート）
 *
 * Web層はこのインターフェースだけを知っていて、どのストアに書かれるかは知らない。
 */
export interface RecordPointsUseCase {
    /**
     * クイック獲得を記録
     *
     * @throws UnknownCatalogItemException ラベルがカタログにない場合
     */
    quickEarn(command: QuickEarnCommand): Promise<LedgerEntryId>;

    /**
     * ご褒美を交換（コストを負のエントリとして記録）
     *
     * @throws UnknownCatalogItemException ご褒美がカタログにない場合
     * @throws InsufficientBalanceException コストが残高を上回る場合
     */
    redeemReward(command: RedeemRewardCommand): Promise<LedgerEntryId>;

    /**
     * 保護者による任意の加減算を記録
     */
    adjustPoints(command: AdjustPointsCommand): Promise<LedgerEntryId>;

    /**
     * エントリを削除（存在しなければ何もしない）
     */
    deleteEntry(id: LedgerEntryId): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const RecordPointsUseCaseToken = Symbol('RecordPointsUseCase');
