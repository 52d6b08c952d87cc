import {computeTotals} from '../service/BalanceCalculator';
import type {LedgerTotals} from '../service/BalanceCalculator';
import type {CalendarDate} from './CalendarDate';
import {compareLedgerOrder} from './LedgerEntry';
import type {LedgerEntry} from './LedgerEntry';

/**
 * 台帳のスナップショット
 *
 * ストアの list() の結果をまとめて保持する読み取り専用のビュー。
 * エントリは常に表示順（entryDate 降順 → id 降順）で保持する。
 */
export class Ledger {
    private readonly entries: readonly LedgerEntry[];

    constructor(...entries: LedgerEntry[]) {
        this.entries = [...entries].sort(compareLedgerOrder);
    }

    /**
     * エントリの一覧（表示順、変更不可）
     */
    getEntries(): readonly LedgerEntry[] {
        return this.entries;
    }

    /**
     * 集計値を計算
     *
     * @param today 「今日」とみなす暦日
     */
    calculateTotals(today: CalendarDate): LedgerTotals {
        return computeTotals(this.entries, today);
    }
}
