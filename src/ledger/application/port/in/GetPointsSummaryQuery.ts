import type {LedgerEntry} from '../../domain/model/LedgerEntry';
import type {QuickAction, Reward, RewardAffordability} from '../../domain/model/RewardCatalog';
import type {LedgerTotals} from '../../domain/service/BalanceCalculator';

/**
 * 画面表示用のまとめ
 */
export interface PointsSummary {
    readonly totals: LedgerTotals;
    readonly worth: {
        readonly balance: string;
        readonly lifetime: string;
    };
    readonly rewards: readonly Reward[];
    readonly affordability: RewardAffordability;
    readonly quickActions: readonly QuickAction[];
}

/**
 * 読み取り専用のクエリ（入力ポート）
 */
export interface GetPointsSummaryQuery {
    /**
     * 台帳全体から集計値とご褒美の交換可否を計算する
     */
    getSummary(): Promise<PointsSummary>;

    /**
     * 履歴（entryDate 降順 → id 降順）
     */
    getHistory(): Promise<readonly LedgerEntry[]>;
}

/**
 * DI用のシンボル
 */
export const GetPointsSummaryQueryToken = Symbol('GetPointsSummaryQuery');
