import {CalendarDate} from '../../../application/domain/model/CalendarDate';
import type {Clock} from '../../../application/port/out/Clock';

/**
 * システム時刻から「今日」を求める Clock
 *
 * タイムゾーン未指定ならプロセスのローカルタイムゾーン（TZ 環境変数）を使う。
 */
export class SystemClock implements Clock {
    constructor(
        private readonly timeZone?: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    today(): CalendarDate {
        const now = this.now();
        return this.timeZone
            ? CalendarDate.fromDateInTimeZone(now, this.timeZone)
            : CalendarDate.fromLocalDate(now);
    }
}
