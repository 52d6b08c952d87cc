import type {CalendarDate} from '../model/CalendarDate';
import type {LedgerEntry} from '../model/LedgerEntry';
import {Points} from '../model/Points';

/**
 * 台帳スナップショットから導出される集計値
 *
 * - lifetime: 獲得ポイントの累計（points > 0 の合計）
 * - spent: 消費ポイントの累計（points < 0 の合計、常に 0 以下）
 * - balance: 現在の残高（lifetime + spent = 全エントリの合計）
 * - today: 指定日の増減（符号込み。今日の消費はここを減らす）
 */
export interface LedgerTotals {
    readonly lifetime: Points;
    readonly spent: Points;
    readonly balance: Points;
    readonly today: Points;
}

/**
 * 残高計算（純粋関数）
 *
 * ストアから取得済みのスナップショットに対して集計するだけで、副作用はない。
 * 不正な行（小数のポイント、日付なし）はストア境界のマッパーで拒否済みなので、
 * ここで失敗することはない。
 *
 * @param entries 台帳エントリ（順序は問わない）
 * @param today 「今日」とみなす暦日。挿入時刻ではなく entryDate と比較する
 */
export function computeTotals(entries: readonly LedgerEntry[], today: CalendarDate): LedgerTotals {
    const lifetime = Points.sum(
        entries.filter((e) => e.isEarn()).map((e) => e.getPoints())
    );

    const spent = Points.sum(
        entries.filter((e) => e.isSpend()).map((e) => e.getPoints())
    );

    const todayPoints = Points.sum(
        entries.filter((e) => e.isDatedOn(today)).map((e) => e.getPoints())
    );

    return {
        lifetime,
        spent,
        balance: lifetime.plus(spent),
        today: todayPoints,
    };
}
