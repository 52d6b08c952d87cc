import type {CalendarDate} from '../../domain/model/CalendarDate';

/**
 * 「今日」を提供する出力ポート
 *
 * 集計の today と、クイック獲得・交換の entryDate に使う。
 * テストでは固定日付の実装に差し替える。
 */
export interface Clock {
    today(): CalendarDate;
}

/**
 * DI用のシンボル
 */
export const ClockToken = Symbol('Clock');
